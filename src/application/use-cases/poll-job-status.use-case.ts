import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  PollJobStatusCommand,
  PollJobStatusPort,
  PollJobStatusResult,
} from '../ports/input/poll-job-status.port';
import { EVENT_PUBLISHER_PORT, JOB_SERVICE_PORT } from '../ports/output';
import { JobServicePort } from '../ports/output/job-service.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { ExtractionJobEntity } from '../../domain/entities/extraction-job.entity';
import { JobPhase } from '../../domain/value-objects/job-phase.vo';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import { JobFailedEvent, JobFailureReason } from '../../domain/events/job-failed.event';
import { isArchiveError } from '../../domain/errors/archive.errors';

/**
 * Poll Job Status Use Case
 * Reads the job document immediately, then at a fixed interval, until the job
 * is terminal or the deadline passes. Success is only ever the COMPLETED phase.
 * A status read that fails for this job alone fails the job; fatal archive
 * errors propagate.
 */
@Injectable()
export class PollJobStatusUseCase implements PollJobStatusPort {
  private readonly logger = new Logger(PollJobStatusUseCase.name);

  constructor(
    @Inject(JOB_SERVICE_PORT)
    private readonly jobService: JobServicePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: PollJobStatusCommand): Promise<PollJobStatusResult> {
    const { intervalMs, deadlineMs } = command.polling;
    const startedAt = Date.now();
    let job = command.job;

    for (;;) {
      try {
        const snapshot = await this.jobService.getJob(job.jobUrl);
        job = job.withRemoteState(snapshot);
      } catch (error) {
        if (isArchiveError(error) && error.fatal) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        return this.failed(job, 'status_unavailable', message);
      }

      if (job.isCompleted()) {
        return this.completed(job, startedAt);
      }

      if (job.isFailed()) {
        return this.failed(job, failureReasonFor(job), job.failureMessage());
      }

      const elapsed = Date.now() - startedAt;
      if (elapsed >= deadlineMs) {
        return this.failed(
          job,
          'polling_timeout',
          `Job still ${job.phase.value} after ${Math.round(elapsed / 1000)}s`,
        );
      }

      this.logger.log(
        `Job ${job.jobId} is ${job.phase.value}, checking again in ${Math.round(intervalMs / 1000)}s`,
      );
      await this.delay(Math.min(intervalMs, deadlineMs - elapsed));
    }
  }

  private async completed(
    job: ExtractionJobEntity,
    startedAt: number,
  ): Promise<PollJobStatusResult> {
    this.logger.log(`Job ${job.jobId} completed with ${job.resultUrls.length} result(s)`);

    await this.eventPublisher.publish(
      new JobCompletedEvent({
        jobId: job.jobId,
        recordId: job.recordId,
        resultCount: job.resultUrls.length,
        pollCount: job.pollCount,
        durationMs: Date.now() - startedAt,
      }),
    );

    return { outcome: 'completed', job };
  }

  private async failed(
    job: ExtractionJobEntity,
    failureReason: JobFailureReason,
    errorMessage: string,
  ): Promise<PollJobStatusResult> {
    this.logger.warn(`Job ${job.jobId} failed (${failureReason}): ${errorMessage}`);

    await this.eventPublisher.publish(
      new JobFailedEvent({
        jobId: job.jobId,
        recordId: job.recordId,
        errorMessage,
        failureReason,
      }),
    );

    return { outcome: 'failed', job, failureReason, errorMessage };
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function failureReasonFor(job: ExtractionJobEntity): JobFailureReason {
  switch (job.phase.value) {
    case JobPhase.ABORTED:
      return 'job_aborted';
    case JobPhase.ARCHIVED:
      return 'job_archived';
    default:
      return 'job_error';
  }
}
