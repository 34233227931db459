import { DomainEvent } from './base.event';

/**
 * Job Submitted Event
 * Emitted once a SODA job has been created, parameterised and started
 */
export interface JobSubmittedEventPayload {
  jobId: string;
  jobUrl: string;
  recordId: string;
  serviceName: string;
  parameterCount: number;
}

export class JobSubmittedEvent extends DomainEvent {
  constructor(public readonly payload: JobSubmittedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.submitted';
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
