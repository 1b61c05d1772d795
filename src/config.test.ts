import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      PORT: 3001,
      DATABASE_PATH: 'data/jobs.db',
      BACKUP_DIR: 'backups',
      ADZUNA_APP_ID: undefined,
      ADZUNA_APP_KEY: undefined,
      ADZUNA_COUNTRY: 'gb',
      SEARCH_LOCATION: 'London',
      REQUEST_DELAY_MS: 1000,
      REQUEST_TIMEOUT_MS: 15000,
      SCORING_PRESET: 'fintech',
      HEALTH_CHECK_INTERVAL_MS: 300000,
      METRICS_RETENTION_DAYS: 90,
      BACKUP_RETENTION_DAYS: 7,
      PROFILE_PATH: undefined,
    });
  });

  it('coerces numbers and treats blank credentials as unset', () => {
    const config = loadConfig({ PORT: '8080', ADZUNA_APP_ID: '', ADZUNA_APP_KEY: 'test-key', SCORING_PRESET: 'basic' });
    expect(config.PORT).toBe(8080);
    expect(config.ADZUNA_APP_ID).toBeUndefined();
    expect(config.ADZUNA_APP_KEY).toBe('test-key');
    expect(config.SCORING_PRESET).toBe('basic');
  });

  it('names the invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT: /);
    expect(() => loadConfig({ SCORING_PRESET: 'crypto' })).toThrow(/SCORING_PRESET/);
  });
});
