export type GlobalOptions = {
  archive?: string;
  pollInterval?: string;
  deadline?: string;
  logLevel?: string;
};

function scaled(value: string, factor: number): string {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? String(Math.round(parsed * factor)) : value;
}

/**
 * Map global command line options onto the environment variables they override.
 * Values are validated together with the environment when configuration loads.
 */
export function toEnvironmentOverrides(options: GlobalOptions): Record<string, string> {
  const overrides: Record<string, string> = {};

  if (options.archive !== undefined) {
    overrides.ARCHIVE_ENVIRONMENT = options.archive;
  }
  if (options.pollInterval !== undefined) {
    overrides.POLL_INTERVAL_MS = scaled(options.pollInterval, 1000);
  }
  if (options.deadline !== undefined) {
    overrides.POLL_DEADLINE_MS = scaled(options.deadline, 60_000);
  }
  if (options.logLevel !== undefined) {
    overrides.LOG_LEVEL = options.logLevel;
  }

  return overrides;
}
