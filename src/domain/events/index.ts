/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { JobSubmittedEvent, type JobSubmittedEventPayload } from './job-submitted.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export {
  JobFailedEvent,
  type JobFailedEventPayload,
  type JobFailureReason,
} from './job-failed.event';
export {
  ArtifactDownloadedEvent,
  type ArtifactDownloadedEventPayload,
} from './artifact-downloaded.event';
export { ArtifactFailedEvent, type ArtifactFailedEventPayload } from './artifact-failed.event';
