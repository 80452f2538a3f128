import { describe, expect, it } from 'vitest';

import { DISMISSAL_KINDS, DISMISSAL_RULES, isDismissalKind } from '../src/dismissal.constants.js';

describe('dismissal rules', () => {
  it('has a rule for every dismissal kind', () => {
    expect(Object.keys(DISMISSAL_RULES).sort()).toEqual([...DISMISSAL_KINDS].sort());
  });

  it('credits the bowler only for dismissals the bowler effects', () => {
    const credited = DISMISSAL_KINDS.filter((kind) => DISMISSAL_RULES[kind].creditsBowler);

    expect(credited).toEqual(['bowled', 'caught', 'caught and bowled', 'lbw', 'stumped', 'hit wicket']);
  });

  it('does not count retirements without dismissal as wickets', () => {
    const notWickets = DISMISSAL_KINDS.filter((kind) => !DISMISSAL_RULES[kind].countsAsWicket);

    expect(notWickets).toEqual(['retired hurt', 'retired not out']);
  });

  it('credits run outs to every fielder involved', () => {
    expect(DISMISSAL_RULES['run out']).toEqual({
      creditsBowler: false,
      countsAsWicket: true,
      fielding: 'run-out',
      creditedFielders: 'all',
    });
  });

  it('recognises known kinds only', () => {
    expect(isDismissalKind('caught and bowled')).toBe(true);
    expect(isDismissalKind('Caught')).toBe(false);
    expect(isDismissalKind('mystery')).toBe(false);
  });
});
