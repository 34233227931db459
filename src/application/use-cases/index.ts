/**
 * Use Cases Barrel Export
 */
export { QueryCatalogueUseCase } from './query-catalogue.use-case';
export { SubmitExtractionJobUseCase } from './submit-extraction-job.use-case';
export { PollJobStatusUseCase } from './poll-job-status.use-case';
export { DownloadResultsUseCase, artifactFileName } from './download-results.use-case';
export { RunExtractionUseCase } from './run-extraction.use-case';
