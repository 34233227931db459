import { CatalogueRow } from '../../../domain/entities/catalogue-record.entity';

/**
 * Archive account credentials, sent as HTTP Basic auth
 */
export interface ArchiveCredentials {
  username: string;
  password: string;
}

/**
 * Catalogue Service Port (Driven Port)
 * Metadata queries against the archive's TAP and SIA2 services
 */
export interface CatalogueServicePort {
  /**
   * Run an ADQL query through synchronous TAP and return the result rows in order
   */
  queryTap(adql: string, credentials: ArchiveCredentials): Promise<CatalogueRow[]>;

  /**
   * Find images and cubes covering any of the POS criteria (e.g. "CIRCLE 12.5 -45 0.1")
   */
  querySia(positions: string[], credentials: ArchiveCredentials): Promise<CatalogueRow[]>;
}
