import { DomainEvent } from './base.event';

export interface ArtifactDownloadedEventPayload {
  jobId: string;
  url: string;
  path: string;
  sizeBytes: number;
}

export class ArtifactDownloadedEvent extends DomainEvent {
  constructor(public readonly payload: ArtifactDownloadedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'artifact.downloaded';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
