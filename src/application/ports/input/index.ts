/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export {
  type QueryCataloguePort,
  type QueryCatalogueCommand,
  type CatalogueCriteria,
} from './query-catalogue.port';
export {
  type SubmitExtractionJobPort,
  type SubmitExtractionJobCommand,
  type SubmitExtractionJobResult,
  type ExtractionParameters,
} from './submit-extraction-job.port';
export {
  type PollJobStatusPort,
  type PollJobStatusCommand,
  type PollJobStatusResult,
  type PollingSettings,
} from './poll-job-status.port';
export {
  type DownloadResultsPort,
  type DownloadResultsCommand,
  type DownloadResultsResult,
  type ArtifactOutcome,
} from './download-results.port';
export {
  type RunExtractionPort,
  type RunExtractionCommand,
  type RunSummary,
  type RunOutcome,
  type ExtractionPlan,
} from './run-extraction.port';
