import { ExtractionJobEntity } from '../../../domain/entities/extraction-job.entity';

/**
 * Download Results Command
 */
export interface DownloadResultsCommand {
  job: ExtractionJobEntity;
  destinationDir: string;
}

export type ArtifactOutcome =
  | { status: 'downloaded'; url: string; path: string; sizeBytes: number }
  | { status: 'failed'; url: string; errorMessage: string };

/**
 * Download Results Result
 */
export interface DownloadResultsResult {
  artifacts: ArtifactOutcome[];
  downloadedCount: number;
  failedCount: number;
}

/**
 * Download Results Port (Driving Port / Use Case Interface)
 */
export interface DownloadResultsPort {
  execute(command: DownloadResultsCommand): Promise<DownloadResultsResult>;
}
