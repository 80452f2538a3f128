import type { DismissalKind } from '@match-digest/shared-types';

export type FieldingCredit = 'catch' | 'stumping' | 'run-out';

export interface DismissalRule {
  creditsBowler: boolean;
  countsAsWicket: boolean;
  fielding: FieldingCredit | null;
  creditedFielders: 'first' | 'all' | 'none';
}

const bowlerWicket = (
  fielding: FieldingCredit | null = null,
  creditedFielders: DismissalRule['creditedFielders'] = 'none'
): DismissalRule => ({
  creditsBowler: true,
  countsAsWicket: true,
  fielding,
  creditedFielders,
});

const teamWicket = (countsAsWicket = true): DismissalRule => ({
  creditsBowler: false,
  countsAsWicket,
  fielding: null,
  creditedFielders: 'none',
});

// A catch goes to the first listed fielder only, even when several are named.
export const DISMISSAL_RULES: Record<DismissalKind, DismissalRule> = {
  bowled: bowlerWicket(),
  caught: bowlerWicket('catch', 'first'),
  'caught and bowled': bowlerWicket('catch', 'first'),
  lbw: bowlerWicket(),
  stumped: bowlerWicket('stumping', 'all'),
  'hit wicket': bowlerWicket(),
  'run out': {
    creditsBowler: false,
    countsAsWicket: true,
    fielding: 'run-out',
    creditedFielders: 'all',
  },
  'retired hurt': teamWicket(false),
  'retired not out': teamWicket(false),
  'retired out': teamWicket(),
  'obstructing the field': teamWicket(),
  'handled the ball': teamWicket(),
  'hit the ball twice': teamWicket(),
  'timed out': teamWicket(),
  other: teamWicket(),
};

export const DISMISSAL_KINDS: readonly DismissalKind[] = [
  'bowled',
  'caught',
  'caught and bowled',
  'lbw',
  'stumped',
  'hit wicket',
  'hit the ball twice',
  'run out',
  'retired hurt',
  'retired not out',
  'retired out',
  'obstructing the field',
  'handled the ball',
  'timed out',
  'other',
];

export function isDismissalKind(value: string): value is DismissalKind {
  return DISMISSAL_KINDS.some((kind) => kind === value);
}
