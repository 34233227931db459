import { ExtractionJobEntity } from '../../../domain/entities/extraction-job.entity';
import { JobFailureReason } from '../../../domain/events/job-failed.event';

export interface PollingSettings {
  intervalMs: number;
  deadlineMs: number;
}

/**
 * Poll Job Status Command
 */
export interface PollJobStatusCommand {
  job: ExtractionJobEntity;
  polling: PollingSettings;
}

/**
 * Poll Job Status Result
 */
export type PollJobStatusResult =
  | { outcome: 'completed'; job: ExtractionJobEntity }
  | {
      outcome: 'failed';
      job: ExtractionJobEntity;
      failureReason: JobFailureReason;
      errorMessage: string;
    };

/**
 * Poll Job Status Port (Driving Port / Use Case Interface)
 * Re-reads a job until it reaches a terminal phase or the deadline passes
 */
export interface PollJobStatusPort {
  execute(command: PollJobStatusCommand): Promise<PollJobStatusResult>;
}
