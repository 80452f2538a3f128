import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { getConfig, loadConfig, resetConfig, validateConfig, type AppConfig } from '../../src/utils/config.js';
import { ConfigurationError } from '../../src/utils/errors.js';

const configDir = fileURLToPath(new URL('../fixtures/config', import.meta.url));
const brokenConfigDir = fileURLToPath(new URL('../fixtures/config-broken', import.meta.url));

const OVERRIDES = [
  'MATCH_DATA_DIR',
  'DIGEST_OUTPUT_PATH',
  'LOG_LEVEL',
  'LOG_DIRECTORY',
  'PARTNERSHIP_BREAKDOWN_MIN_RUNS',
  'POWERPLAY_OVERS',
  'DEATH_START_OVER',
];

describe('config', () => {
  beforeEach(() => {
    for (const name of OVERRIDES) {
      vi.stubEnv(name, '');
    }
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('reads default.json when there is no file for the environment', () => {
    expect(getConfig(configDir)).toEqual({
      analysis: { partnershipBreakdownMinRuns: 15, phasePolicy: undefined },
      data: { matchDataDir: './matches', outputPath: './out/matches.jsonl' },
      logging: { level: 'warn', directory: './logs', maxFileSize: '1MB', maxFiles: 2 },
    });
  });

  it('applies environment overrides', () => {
    vi.stubEnv('MATCH_DATA_DIR', '/data/in');
    vi.stubEnv('DIGEST_OUTPUT_PATH', '/data/out.jsonl');
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('PARTNERSHIP_BREAKDOWN_MIN_RUNS', '30');
    vi.stubEnv('POWERPLAY_OVERS', '10');
    vi.stubEnv('DEATH_START_OVER', '40');

    const config = getConfig(configDir);

    expect(config.data).toEqual({ matchDataDir: '/data/in', outputPath: '/data/out.jsonl' });
    expect(config.logging.level).toBe('debug');
    expect(config.analysis).toEqual({
      partnershipBreakdownMinRuns: 30,
      phasePolicy: { powerplayOvers: 10, deathStartOver: 40 },
    });
  });

  it('needs both phase boundaries to override the policy', () => {
    vi.stubEnv('POWERPLAY_OVERS', '10');

    expect(getConfig(configDir).analysis.phasePolicy).toBeUndefined();
  });

  it('rejects non-numeric overrides', () => {
    vi.stubEnv('PARTNERSHIP_BREAKDOWN_MIN_RUNS', 'lots');

    expect(() => getConfig(configDir)).toThrow(ConfigurationError);
  });

  it('reports missing and unreadable files', () => {
    expect(() => getConfig('/nonexistent/config')).toThrow(/Configuration file not found/);
    expect(() => getConfig(brokenConfigDir)).toThrow(/is not valid JSON/);
  });

  it('validates values', () => {
    const valid = getConfig(configDir);
    const withAnalysis = (analysis: AppConfig['analysis']): AppConfig => ({ ...valid, analysis });

    expect(() => validateConfig(valid)).not.toThrow();
    expect(() => validateConfig(withAnalysis({ partnershipBreakdownMinRuns: -1 }))).toThrow(
      'Configuration error: partnershipBreakdownMinRuns must not be negative'
    );
    expect(() =>
      validateConfig(
        withAnalysis({ partnershipBreakdownMinRuns: 20, phasePolicy: { powerplayOvers: 6, deathStartOver: 4 } })
      )
    ).toThrow('Configuration error: deathStartOver must not precede the end of the powerplay');
    expect(() => validateConfig({ ...valid, data: { ...valid.data, matchDataDir: '' } })).toThrow(
      'Configuration error: Match data directory not specified'
    );
  });

  it('caches the loaded config until reset', () => {
    const first = loadConfig(configDir);

    expect(loadConfig(configDir)).toBe(first);
    resetConfig();
    expect(loadConfig(configDir)).not.toBe(first);
  });
});
