import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SubmitExtractionJobCommand,
  SubmitExtractionJobPort,
  SubmitExtractionJobResult,
} from '../ports/input/submit-extraction-job.port';
import { DATALINK_PORT, EVENT_PUBLISHER_PORT, JOB_SERVICE_PORT } from '../ports/output';
import { DatalinkPort } from '../ports/output/datalink.port';
import { JobServicePort } from '../ports/output/job-service.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { ExtractionJobEntity } from '../../domain/entities/extraction-job.entity';
import { JobSubmittedEvent } from '../../domain/events/job-submitted.event';

/**
 * Submit Extraction Job Use Case
 * Handles DataLink resolution and the create / parameters / run sequence of a SODA job
 */
@Injectable()
export class SubmitExtractionJobUseCase implements SubmitExtractionJobPort {
  private readonly logger = new Logger(SubmitExtractionJobUseCase.name);

  constructor(
    @Inject(DATALINK_PORT)
    private readonly datalink: DatalinkPort,
    @Inject(JOB_SERVICE_PORT)
    private readonly jobService: JobServicePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: SubmitExtractionJobCommand): Promise<SubmitExtractionJobResult> {
    const { record, serviceName, parameters } = command;

    const link = await this.datalink.resolveService(record, serviceName, command.credentials);
    if (!link) {
      const reason = `No ${serviceName} access for ${record.id}`;
      this.logger.warn(`${reason}, skipping`);
      return { status: 'skipped', reason };
    }

    const created = await this.jobService.createJob([link.idToken], link.accessUrl);
    this.logger.log(`Created job ${created.jobId} for ${record.id}`);

    // One call per key; empty value lists are not sent
    const populated = Object.entries(parameters).filter(([, values]) => values.length > 0);
    for (const [key, values] of populated) {
      await this.jobService.addParameters(created.jobUrl, key, [...values]);
    }

    await this.jobService.startJob(created.jobUrl);

    const job = ExtractionJobEntity.create({
      jobId: created.jobId,
      jobUrl: created.jobUrl,
      recordId: record.id,
      serviceName,
    });

    await this.eventPublisher.publish(
      new JobSubmittedEvent({
        jobId: job.jobId,
        jobUrl: job.jobUrl,
        recordId: record.id,
        serviceName,
        parameterCount: populated.reduce((count, [, values]) => count + values.length, 0),
      }),
    );

    return { status: 'submitted', job };
  }
}
