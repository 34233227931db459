import { CatalogueRecord } from '../../../domain/entities/catalogue-record.entity';
import { ArchiveCredentials } from '../output/catalogue-service.port';
import { PollingSettings } from './poll-job-status.port';
import { ExtractionParameters } from './submit-extraction-job.port';

/**
 * What to extract from one record
 */
export interface ExtractionPlan {
  serviceName: string;
  parameters: ExtractionParameters;
}

/**
 * Run Extraction Command
 */
export interface RunExtractionCommand {
  records: ReadonlyArray<CatalogueRecord>;
  /** Returns null to skip the record */
  planFor: (record: CatalogueRecord) => ExtractionPlan | null;
  credentials: ArchiveCredentials;
  destinationDir: string;
  polling: PollingSettings;
}

export type RunOutcome = 'success' | 'partial' | 'empty';

/**
 * Run Summary
 */
export interface RunSummary {
  recordsFound: number;
  jobsSubmitted: number;
  jobsSkipped: number;
  jobsCompleted: number;
  jobsFailed: number;
  artifactsDownloaded: number;
  artifactsFailed: number;
  outcome: RunOutcome;
}

/**
 * Run Extraction Port (Driving Port / Use Case Interface)
 * Submits, polls and downloads one job per record, one record at a time
 */
export interface RunExtractionPort {
  execute(command: RunExtractionCommand): Promise<RunSummary>;
}
