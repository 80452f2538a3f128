import { describe, expect, it } from 'vitest';

import type { OverSummary } from '@match-digest/shared-types';
import { buildPhaseSplits, classifyOver, resolvePhasePolicy } from '../../src/data/phases.js';

function overSummary(over: number, runs: number, validBalls = 6, wickets = 0): OverSummary {
  return {
    over,
    bowlers: ['S One'],
    runs,
    wickets,
    fours: 0,
    sixes: 0,
    extras: 0,
    dots: 0,
    balls: validBalls,
    validBalls,
    cumulativeRuns: 0,
    cumulativeWickets: 0,
    runRate: 0,
    cumulativeRunRate: 0,
    maiden: false,
    phase: classifyOver(over, { powerplayOvers: 6, deathStartOver: 16 }),
  };
}

describe('classifyOver', () => {
  const policy = { powerplayOvers: 6, deathStartOver: 16 };

  it('splits T20 overs at 6 and 16', () => {
    expect([0, 5, 6, 15, 16, 19].map((over) => classifyOver(over, policy))).toEqual([
      'powerplay',
      'powerplay',
      'middle',
      'middle',
      'death',
      'death',
    ]);
  });
});

describe('resolvePhasePolicy', () => {
  it('prefers an explicit policy', () => {
    expect(resolvePhasePolicy('ODI', { powerplayOvers: 2, deathStartOver: 4 })).toEqual({
      powerplayOvers: 2,
      deathStartOver: 4,
    });
  });

  it('uses presets by match type, case-insensitively', () => {
    expect(resolvePhasePolicy('odi')).toEqual({ powerplayOvers: 10, deathStartOver: 40 });
    expect(resolvePhasePolicy('IT20')).toEqual({ powerplayOvers: 6, deathStartOver: 16 });
  });

  it('falls back to the T20 default', () => {
    expect(resolvePhasePolicy('Test')).toEqual({ powerplayOvers: 6, deathStartOver: 16 });
  });
});

describe('buildPhaseSplits', () => {
  it('sums overs into their phases', () => {
    const splits = buildPhaseSplits(
      [overSummary(0, 8), overSummary(5, 4, 6, 1), overSummary(10, 6), overSummary(17, 12, 3)],
      { powerplayOvers: 6, deathStartOver: 16 }
    );

    expect(splits).toEqual([
      {
        phase: 'powerplay',
        firstOver: 0,
        lastOver: 5,
        overs: 2,
        runs: 12,
        wickets: 1,
        fours: 0,
        sixes: 0,
        extras: 0,
        dots: 0,
        validBalls: 12,
        runRate: 6,
      },
      {
        phase: 'middle',
        firstOver: 6,
        lastOver: 15,
        overs: 1,
        runs: 6,
        wickets: 0,
        fours: 0,
        sixes: 0,
        extras: 0,
        dots: 0,
        validBalls: 6,
        runRate: 6,
      },
      {
        phase: 'death',
        firstOver: 16,
        lastOver: null,
        overs: 1,
        runs: 12,
        wickets: 0,
        fours: 0,
        sixes: 0,
        extras: 0,
        dots: 0,
        validBalls: 3,
        runRate: 24,
      },
    ]);
  });

  it('reports a zero run rate for an empty phase', () => {
    const [, middle] = buildPhaseSplits([overSummary(0, 5)], { powerplayOvers: 6, deathStartOver: 16 });

    expect(middle).toMatchObject({ overs: 0, validBalls: 0, runRate: 0 });
  });
});
