import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LogEventPublisherAdapter } from '../../../src/infrastructure/adapters/events/log-event-publisher.adapter';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { ArtifactFailedEvent } from '../../../src/domain/events/artifact-failed.event';
import { createTestLogger } from '../helpers/mock-factories';

describe('LogEventPublisherAdapter', () => {
  let logger: PinoLoggerService;
  let adapter: LogEventPublisherAdapter;

  beforeEach(() => {
    logger = createTestLogger();
    adapter = new LogEventPublisherAdapter(logger);
  });

  it('should log each event with its payload', async () => {
    const info = vi.spyOn(logger, 'info');
    const event = new ArtifactFailedEvent({
      jobId: 'job-1',
      url: 'https://data.archive.test/download/1',
      errorMessage: 'HTTP 404',
    });

    await adapter.publish(event);

    expect(info).toHaveBeenCalledWith(
      {
        event: expect.objectContaining({
          eventId: event.eventId,
          eventName: 'artifact.failed',
          payload: { jobId: 'job-1', url: 'https://data.archive.test/download/1', errorMessage: 'HTTP 404' },
        }),
      },
      '[EVENT] artifact.failed',
    );
  });
});
