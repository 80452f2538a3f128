import type { MatchPhase, PhasePolicy } from '@match-digest/shared-types';

export const MATCH_PHASES: readonly MatchPhase[] = ['powerplay', 'middle', 'death'];

// Powerplay overs 0-5, middle 6-15, death 16 onwards.
export const DEFAULT_PHASE_POLICY: PhasePolicy = {
  powerplayOvers: 6,
  deathStartOver: 16,
};

export const PHASE_POLICY_PRESETS: Readonly<Record<string, PhasePolicy>> = {
  T20: DEFAULT_PHASE_POLICY,
  IT20: DEFAULT_PHASE_POLICY,
  T20I: DEFAULT_PHASE_POLICY,
  ODI: { powerplayOvers: 10, deathStartOver: 40 },
  ODM: { powerplayOvers: 10, deathStartOver: 40 },
};

export const PHASE_LABELS: Readonly<Record<MatchPhase, string>> = {
  powerplay: 'Powerplay',
  middle: 'Middle Overs',
  death: 'Death Overs',
};
