/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  type CatalogueServicePort,
  type ArchiveCredentials,
} from './catalogue-service.port';
export { type DatalinkPort, type ServiceLink } from './datalink.port';
export {
  type JobServicePort,
  type CreatedJob,
  type ResultStream,
} from './job-service.port';
export { type FileStoragePort } from './file-storage.port';
export { type EventPublisherPort } from './event-publisher.port';

// Injection tokens
export const CATALOGUE_SERVICE_PORT = Symbol('CatalogueServicePort');
export const DATALINK_PORT = Symbol('DatalinkPort');
export const JOB_SERVICE_PORT = Symbol('JobServicePort');
export const FILE_STORAGE_PORT = Symbol('FileStoragePort');
export const EVENT_PUBLISHER_PORT = Symbol('EventPublisherPort');
