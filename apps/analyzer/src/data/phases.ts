import type { MatchPhase, OverSummary, PhasePolicy, PhaseSplit } from '@match-digest/shared-types';
import {
  DEFAULT_BALLS_PER_OVER,
  DEFAULT_PHASE_POLICY,
  MATCH_PHASES,
  PHASE_POLICY_PRESETS,
} from '@match-digest/constants';

export function classifyOver(over: number, policy: PhasePolicy): MatchPhase {
  if (over < policy.powerplayOvers) return 'powerplay';
  if (over < policy.deathStartOver) return 'middle';
  return 'death';
}

/**
 * Pick the phase boundaries for a match: an explicit policy wins, then the
 * preset for the match type, then the T20 default
 */
export function resolvePhasePolicy(matchType: string, override?: PhasePolicy): PhasePolicy {
  if (override) {
    return override;
  }
  return PHASE_POLICY_PRESETS[matchType.toUpperCase()] ?? DEFAULT_PHASE_POLICY;
}

function phaseRange(phase: MatchPhase, policy: PhasePolicy): { firstOver: number; lastOver: number | null } {
  switch (phase) {
    case 'powerplay':
      return { firstOver: 0, lastOver: policy.powerplayOvers - 1 };
    case 'middle':
      return { firstOver: policy.powerplayOvers, lastOver: policy.deathStartOver - 1 };
    case 'death':
      return { firstOver: policy.deathStartOver, lastOver: null };
  }
}

/**
 * Sum finalized over summaries into the three phase buckets
 */
export function buildPhaseSplits(
  overs: readonly OverSummary[],
  policy: PhasePolicy,
  ballsPerOver: number = DEFAULT_BALLS_PER_OVER
): PhaseSplit[] {
  return MATCH_PHASES.map((phase) => {
    const split: PhaseSplit = {
      phase,
      ...phaseRange(phase, policy),
      overs: 0,
      runs: 0,
      wickets: 0,
      fours: 0,
      sixes: 0,
      extras: 0,
      dots: 0,
      validBalls: 0,
      runRate: 0,
    };

    for (const over of overs) {
      if (over.phase !== phase) continue;
      split.overs += 1;
      split.runs += over.runs;
      split.wickets += over.wickets;
      split.fours += over.fours;
      split.sixes += over.sixes;
      split.extras += over.extras;
      split.dots += over.dots;
      split.validBalls += over.validBalls;
    }

    split.runRate = split.validBalls > 0 ? (split.runs * ballsPerOver) / split.validBalls : 0;
    return split;
  });
}
