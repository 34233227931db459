import { describe, it, expect } from 'vitest';
import { toEnvironmentOverrides } from '../../../src/cli/global-options';

describe('toEnvironmentOverrides', () => {
  it('should convert seconds and minutes to milliseconds', () => {
    expect(
      toEnvironmentOverrides({ archive: 'at', pollInterval: '2.5', deadline: '90', logLevel: 'debug' }),
    ).toEqual({
      ARCHIVE_ENVIRONMENT: 'at',
      POLL_INTERVAL_MS: '2500',
      POLL_DEADLINE_MS: '5400000',
      LOG_LEVEL: 'debug',
    });
  });

  it('should leave unset options out', () => {
    expect(toEnvironmentOverrides({})).toEqual({});
  });

  it('should pass non-numeric values through for validation to reject', () => {
    expect(toEnvironmentOverrides({ pollInterval: 'soon' })).toEqual({ POLL_INTERVAL_MS: 'soon' });
  });
});
