import { CatalogueRecord } from '../../../domain/entities/catalogue-record.entity';
import { ArchiveCredentials } from './catalogue-service.port';

/**
 * A DataLink service entry for one data product
 */
export interface ServiceLink {
  serviceName: string;
  /** Token identifying the data product to the service, passed as ID */
  idToken: string;
  /** Endpoint advertised by the service descriptor, when there is one */
  accessUrl?: string;
}

/**
 * DataLink Port (Driven Port)
 */
export interface DatalinkPort {
  /**
   * Resolve the named service for a record. Returns null when the record's
   * DataLink document does not offer that service.
   */
  resolveService(
    record: CatalogueRecord,
    serviceName: string,
    credentials: ArchiveCredentials,
  ): Promise<ServiceLink | null>;
}
