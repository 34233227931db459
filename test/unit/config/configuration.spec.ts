import { describe, it, expect } from 'vitest';
import { ARCHIVE_ENDPOINTS, buildConfiguration } from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';

describe('configuration', () => {
  it('should default to the production archive and documented timings', () => {
    const config = buildConfiguration({});

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      archive: {
        environment: 'prod',
        voBaseUrl: ARCHIVE_ENDPOINTS.prod.voBaseUrl,
        sodaBaseUrl: ARCHIVE_ENDPOINTS.prod.sodaBaseUrl,
      },
      http: { timeoutMs: 60000, downloadTimeoutMs: 1800000, statusMaxRetries: 2 },
      polling: { intervalMs: 20000, deadlineMs: 7200000 },
    });
  });

  it('should select endpoints by archive environment', () => {
    expect(buildConfiguration({ ARCHIVE_ENVIRONMENT: 'at' }).archive.voBaseUrl).toBe(
      ARCHIVE_ENDPOINTS.at.voBaseUrl,
    );
  });

  it('should let explicit base URLs win and end them with a slash', () => {
    const config = buildConfiguration({
      ARCHIVE_ENVIRONMENT: 'dev',
      ARCHIVE_VO_BASE_URL: 'https://vo.archive.test/vo',
      ARCHIVE_SODA_BASE_URL: 'https://data.archive.test/access/',
    });

    expect(config.archive.voBaseUrl).toBe('https://vo.archive.test/vo/');
    expect(config.archive.sodaBaseUrl).toBe('https://data.archive.test/access/');
  });

  it('should coerce numeric settings from strings', () => {
    const config = buildConfiguration({ POLL_INTERVAL_MS: '0', POLL_DEADLINE_MS: '60000' });

    expect(config.polling).toEqual({ intervalMs: 0, deadlineMs: 60000 });
  });

  it('should list every invalid setting', () => {
    expect(() =>
      validateEnv({ ARCHIVE_ENVIRONMENT: 'staging', POLL_INTERVAL_MS: 'soon' }),
    ).toThrow(/^Environment validation failed:\n {2}- ARCHIVE_ENVIRONMENT: .+\n {2}- POLL_INTERVAL_MS: .+$/);
  });

  it('should reject a zero deadline', () => {
    expect(() => validateEnv({ POLL_DEADLINE_MS: '0' })).toThrow(/POLL_DEADLINE_MS/);
  });
});
