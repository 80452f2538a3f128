export type DismissalKind =
  | 'bowled'
  | 'caught'
  | 'caught and bowled'
  | 'lbw'
  | 'stumped'
  | 'run out'
  | 'hit wicket'
  | 'retired hurt'
  | 'retired out'
  | 'retired not out'
  | 'obstructing the field'
  | 'handled the ball'
  | 'hit the ball twice'
  | 'timed out'
  | 'other';

// Cricsheet input as it appears on disk. Every field is optional; the parser
// decides what is fatal and what defaults.

export interface RawFielder {
  name?: string;
  position?: string;
  substitute?: boolean;
}

export interface RawWicket {
  player_out?: string;
  kind?: string;
  fielders?: Array<RawFielder | string>;
}

export interface RawDelivery {
  batter?: string;
  batsman?: string;
  bowler?: string;
  non_striker?: string;
  runs?: {
    batter?: number;
    batsman?: number;
    extras?: number;
    total?: number;
    non_boundary?: boolean;
  };
  extras?: {
    wides?: number;
    noballs?: number;
    byes?: number;
    legbyes?: number;
    penalty?: number;
  };
  wickets?: RawWicket[];
  wicket?: RawWicket;
}

export interface RawOver {
  over?: number;
  deliveries?: RawDelivery[];
}

export interface RawInnings {
  team?: string;
  overs?: RawOver[];
  target?: { runs?: number; overs?: number };
  super_over?: boolean;
}

export interface RawMatchInfo {
  balls_per_over?: number;
  city?: string;
  dates?: string[];
  event?: { name?: string; match_number?: number };
  gender?: string;
  match_type?: string;
  officials?: {
    umpires?: string[];
    tv_umpires?: string[];
    reserve_umpires?: string[];
    match_referees?: string[];
  };
  outcome?: {
    winner?: string;
    by?: { runs?: number; wickets?: number; innings?: number };
    method?: string;
    result?: string;
    eliminator?: string;
  };
  player_of_match?: string[];
  players?: Record<string, string[]>;
  season?: string | number;
  team_type?: string;
  teams?: string[];
  toss?: { winner?: string; decision?: string };
  venue?: string;
}

export interface RawMatch {
  info?: RawMatchInfo;
  innings?: RawInnings[];
}

// Normalized record

export interface Fielder {
  readonly name: string;
  readonly position: string;
  readonly substitute: boolean;
}

export interface Wicket {
  readonly playerOut: string;
  readonly kind: DismissalKind;
  readonly rawKind: string;
  readonly fielders: readonly Fielder[];
}

export interface DeliveryRuns {
  readonly batter: number;
  readonly extras: number;
  readonly total: number;
  readonly nonBoundary: boolean;
}

export interface DeliveryExtras {
  readonly wides: number;
  readonly noballs: number;
  readonly byes: number;
  readonly legbyes: number;
  readonly penalty: number;
}

export interface Delivery {
  readonly batter: string;
  readonly nonStriker: string;
  readonly bowler: string;
  readonly runs: DeliveryRuns;
  readonly extras: DeliveryExtras;
  readonly wickets: readonly Wicket[];
}

export interface Over {
  readonly over: number;
  readonly deliveries: readonly Delivery[];
}

export interface FieldAnomaly {
  readonly path: string;
  readonly message: string;
}

export interface Innings {
  readonly index: number;
  readonly team: string;
  readonly overs: readonly Over[];
  readonly target: { readonly runs: number; readonly overs: number | null } | null;
  readonly superOver: boolean;
  readonly anomalies: readonly FieldAnomaly[];
}

export interface TossInfo {
  readonly winner: string;
  readonly decision: string;
}

export interface Officials {
  readonly umpires: readonly string[];
  readonly tvUmpires: readonly string[];
  readonly reserveUmpires: readonly string[];
  readonly matchReferees: readonly string[];
}

export interface MatchOutcome {
  readonly winner: string | null;
  readonly by: { readonly runs?: number; readonly wickets?: number; readonly innings?: number };
  readonly method: string | null;
  readonly result: string | null;
  readonly eliminator: string | null;
}

export interface MatchRecord {
  readonly matchId: string;
  readonly teams: readonly [string, string];
  readonly venue: string;
  readonly city: string;
  readonly dates: readonly string[];
  readonly date: string;
  readonly event: string;
  readonly matchNumber: number | null;
  readonly matchType: string;
  readonly gender: string;
  readonly season: string;
  readonly teamType: string;
  readonly ballsPerOver: number;
  readonly toss: TossInfo | null;
  readonly players: Readonly<Record<string, readonly string[]>>;
  readonly officials: Officials;
  readonly outcome: MatchOutcome | null;
  readonly playerOfMatch: readonly string[];
  readonly innings: readonly Innings[];
}
