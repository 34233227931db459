import { DomainEvent } from './base.event';

/**
 * Artifact Failed Event
 * Emitted when one result file cannot be downloaded; the job's other results still are
 */
export interface ArtifactFailedEventPayload {
  jobId: string;
  url: string;
  errorMessage: string;
}

export class ArtifactFailedEvent extends DomainEvent {
  constructor(public readonly payload: ArtifactFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'artifact.failed';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
