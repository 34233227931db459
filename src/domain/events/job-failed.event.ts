import { DomainEvent } from './base.event';

export type JobFailureReason =
  | 'job_error'
  | 'job_aborted'
  | 'job_archived'
  | 'polling_timeout'
  | 'status_unavailable';

/**
 * Job Failed Event
 * Emitted when a job ends in a failure phase, misses its polling deadline or
 * stops answering status reads
 */
export interface JobFailedEventPayload {
  jobId: string;
  recordId: string;
  errorMessage: string;
  failureReason: JobFailureReason;
}

export class JobFailedEvent extends DomainEvent {
  constructor(public readonly payload: JobFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.failed';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  get failureReason(): JobFailureReason {
    return this.payload.failureReason;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
