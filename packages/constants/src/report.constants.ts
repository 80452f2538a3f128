export const UNKNOWN = 'Unknown';

export const DEFAULT_BALLS_PER_OVER = 6;

export const REPORT_DEFAULTS = {
  PARTNERSHIP_BREAKDOWN_MIN_RUNS: 20,
  SECTION_SEPARATOR: '\n\n',
} as const;
