/**
 * In-Memory Adapters Barrel Export
 */
export { InMemoryCatalogueServiceAdapter } from './in-memory-catalogue-service.adapter';
export { InMemoryDatalinkAdapter } from './in-memory-datalink.adapter';
export {
  InMemoryJobServiceAdapter,
  IN_MEMORY_JOB_BASE_URL,
} from './in-memory-job-service.adapter';
export { InMemoryFileStorageAdapter } from './in-memory-file-storage.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
