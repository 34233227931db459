/**
 * Application Configuration
 *
 * Loads and validates environment variables into a typed {@link AppConfig}.
 * Command line options are merged over the environment before validation, so a
 * `--poll-interval` flag and `POLL_INTERVAL_MS` go through the same schema.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const polling = this.configService.get('polling', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type ArchiveEnvironment = EnvConfig['ARCHIVE_ENVIRONMENT'];

interface ArchiveEndpoints {
  voBaseUrl: string;
  sodaBaseUrl: string;
}

/**
 * Base URLs of each archive deployment. The VO proxy serves TAP, SIA2 and
 * DataLink; the data access application serves SODA async jobs.
 */
export const ARCHIVE_ENDPOINTS: Record<ArchiveEnvironment, ArchiveEndpoints> = {
  prod: {
    voBaseUrl: 'https://data.csiro.au/casda_vo_proxy/vo/',
    sodaBaseUrl: 'https://casda.csiro.au/casda_data_access/',
  },
  at: {
    voBaseUrl: 'https://daplt.csiro.au/casda_vo_proxy/vo/',
    sodaBaseUrl: 'https://casda-at-app.csiro.au/casda_data_access/',
  },
  test: {
    voBaseUrl: 'https://castst.csiro.au/casda_vo_proxy/vo/',
    sodaBaseUrl: 'https://casda-tst-app.csiro.au/casda_data_access/',
  },
  dev: {
    voBaseUrl: 'https://casdev.csiro.au/casda_vo_proxy/vo/',
    sodaBaseUrl: 'https://casda-dev-app.csiro.au/casda_data_access/',
  },
};

/**
 * Application configuration interface.
 *
 * Organized by concern (archive, http, polling) so each adapter reads only
 * the slice it needs.
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  archive: {
    environment: ArchiveEnvironment;
    /** Always ends with a slash. */
    voBaseUrl: string;
    /** Always ends with a slash. */
    sodaBaseUrl: string;
  };
  http: {
    timeoutMs: number;
    downloadTimeoutMs: number;
    /**
     * Network retries for job status reads. Queries, submissions and
     * downloads are never retried.
     */
    statusMaxRetries: number;
  };
  /**
   * Async job polling.
   *
   * ### intervalMs (Environment: POLL_INTERVAL_MS)
   * - Fixed wait between two reads of the job document
   * - The first read happens immediately after the job is started
   *
   * ### deadlineMs (Environment: POLL_DEADLINE_MS)
   * - Overall budget for one job to reach a terminal phase
   * - A job still active past the deadline is reported as failed
   *   (`polling_timeout`) and the run moves on to the next record
   */
  polling: {
    intervalMs: number;
    deadlineMs: number;
  };
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function buildConfiguration(source: Record<string, unknown>): AppConfig {
  const env: EnvConfig = validateEnv(source);
  const endpoints = ARCHIVE_ENDPOINTS[env.ARCHIVE_ENVIRONMENT];

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    archive: {
      environment: env.ARCHIVE_ENVIRONMENT,
      voBaseUrl: withTrailingSlash(env.ARCHIVE_VO_BASE_URL ?? endpoints.voBaseUrl),
      sodaBaseUrl: withTrailingSlash(env.ARCHIVE_SODA_BASE_URL ?? endpoints.sodaBaseUrl),
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
      downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS,
      statusMaxRetries: env.STATUS_MAX_RETRIES,
    },
    polling: {
      intervalMs: env.POLL_INTERVAL_MS,
      deadlineMs: env.POLL_DEADLINE_MS,
    },
  };
}

export default (): AppConfig => buildConfiguration(process.env);
