import { CatalogueRecord } from '../../../domain/entities/catalogue-record.entity';
import { ExtractionJobEntity } from '../../../domain/entities/extraction-job.entity';
import { ArchiveCredentials } from '../output/catalogue-service.port';

/** SODA parameter key to its values, e.g. { pos: ['CIRCLE 1 2 0.1'] } */
export type ExtractionParameters = Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * Submit Extraction Job Command
 */
export interface SubmitExtractionJobCommand {
  record: CatalogueRecord;
  serviceName: string;
  parameters: ExtractionParameters;
  credentials: ArchiveCredentials;
}

export type SubmitExtractionJobResult =
  | { status: 'submitted'; job: ExtractionJobEntity }
  | { status: 'skipped'; reason: string };

/**
 * Submit Extraction Job Port (Driving Port / Use Case Interface)
 * Resolves the record's service through DataLink, then creates, parameterises
 * and starts a SODA async job
 */
export interface SubmitExtractionJobPort {
  execute(command: SubmitExtractionJobCommand): Promise<SubmitExtractionJobResult>;
}
