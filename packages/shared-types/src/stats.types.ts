import type { DismissalKind, MatchRecord } from './match.types.js';

export type MatchPhase = 'powerplay' | 'middle' | 'death';

export interface PhasePolicy {
  powerplayOvers: number;
  deathStartOver: number;
}

export interface MatchupCounters {
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  dots: number;
  dismissals: number;
}

export interface BatterMatchup extends MatchupCounters {
  bowler: string;
  strikeRate: number;
  boundaryPercent: number;
  dotPercent: number;
}

export interface BowlerMatchup extends MatchupCounters {
  batter: string;
  economy: number;
}

export interface BatterDismissal {
  kind: DismissalKind;
  rawKind: string;
  bowler: string;
  fielders: string[];
}

export interface BatterStat {
  name: string;
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  dots: number;
  strikeRate: number;
  dismissal: BatterDismissal | null;
  vsBowlers: BatterMatchup[];
}

export interface BowlerStat {
  name: string;
  balls: number;
  overs: number;
  maidens: number;
  runsConceded: number;
  wickets: number;
  wides: number;
  noballs: number;
  dots: number;
  fours: number;
  sixes: number;
  economy: number;
  wicketShare: number;
  vsBatters: BowlerMatchup[];
}

export interface FielderStat {
  name: string;
  catches: number;
  stumpings: number;
  runOuts: number;
  catchesByPosition: Record<string, number>;
  stumpingsByPosition: Record<string, number>;
  runOutsByPosition: Record<string, number>;
}

export interface PartnershipBowlerSplit {
  bowler: string;
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  dots: number;
  runRate: number;
}

export interface Partnership {
  wicket: number;
  batters: [string, string];
  startScore: number;
  endScore: number;
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  dots: number;
  extras: number;
  runRate: number;
  boundaryPercent: number;
  dotPercent: number;
  vsBowlers: PartnershipBowlerSplit[];
  endedBy: 'wicket' | 'innings-end';
}

export interface OverSummary {
  over: number;
  bowlers: string[];
  runs: number;
  wickets: number;
  fours: number;
  sixes: number;
  extras: number;
  dots: number;
  balls: number;
  validBalls: number;
  cumulativeRuns: number;
  cumulativeWickets: number;
  runRate: number;
  cumulativeRunRate: number;
  maiden: boolean;
  phase: MatchPhase;
}

export interface PhaseSplit {
  phase: MatchPhase;
  firstOver: number;
  lastOver: number | null;
  overs: number;
  runs: number;
  wickets: number;
  fours: number;
  sixes: number;
  extras: number;
  dots: number;
  validBalls: number;
  runRate: number;
}

export interface FallOfWicket {
  wicket: number;
  playerOut: string;
  kind: DismissalKind;
  score: number;
  over: number;
  ball: number;
}

export interface ExtrasBreakdown {
  wides: number;
  noballs: number;
  byes: number;
  legbyes: number;
  penalty: number;
  total: number;
}

export interface InningsTotals {
  runs: number;
  wickets: number;
  balls: number;
  validBalls: number;
  runRate: number;
  fours: number;
  sixes: number;
  dots: number;
  extras: ExtrasBreakdown;
}

export type DeliveryWarningCode =
  | 'malformed-field'
  | 'runs-mismatch'
  | 'over-out-of-order'
  | 'aggregation-failed';

export interface DeliveryWarning {
  kind: 'delivery';
  code: DeliveryWarningCode;
  innings: number;
  path: string;
  message: string;
}

export type PlayerRole = 'batter' | 'non-striker' | 'bowler' | 'fielder' | 'dismissed';

export interface UnknownPlayerReference {
  kind: 'unknown-player';
  innings: number;
  path: string;
  player: string;
  role: PlayerRole;
  occurrences: number;
}

export type AnalysisWarning = DeliveryWarning | UnknownPlayerReference;

export interface InningsStats {
  index: number;
  team: string;
  superOver: boolean;
  target: { runs: number; overs: number | null } | null;
  totals: InningsTotals;
  overs: OverSummary[];
  phases: PhaseSplit[];
  partnerships: Partnership[];
  batters: BatterStat[];
  bowlers: BowlerStat[];
  fielders: FielderStat[];
  fallOfWickets: FallOfWicket[];
  warnings: AnalysisWarning[];
}

export interface MatchTotals {
  runs: number;
  wickets: number;
  fours: number;
  sixes: number;
  extras: number;
  balls: number;
}

export interface MatchStats {
  record: MatchRecord;
  phasePolicy: PhasePolicy;
  innings: InningsStats[];
  totals: MatchTotals;
  warnings: AnalysisWarning[];
}
