import { Injectable } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Log Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log line
 */
@Injectable()
export class LogEventPublisherAdapter implements EventPublisherPort {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(LogEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }
}
