import { DomainEvent } from './base.event';

/**
 * Job Completed Event
 * Emitted when a job reaches COMPLETED and its results are ready to download
 */
export interface JobCompletedEventPayload {
  jobId: string;
  recordId: string;
  resultCount: number;
  pollCount: number;
  durationMs: number;
}

export class JobCompletedEvent extends DomainEvent {
  constructor(public readonly payload: JobCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.completed';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
