import { CatalogueRecord, CatalogueRow } from '../../../domain/entities/catalogue-record.entity';
import { ArchiveCredentials } from '../output/catalogue-service.port';

export type CatalogueCriteria =
  | { kind: 'tap'; adql: string }
  | { kind: 'sia'; positions: string[] };

/**
 * Query Catalogue Command
 */
export interface QueryCatalogueCommand {
  credentials: ArchiveCredentials;
  criteria: CatalogueCriteria;
}

/**
 * Query Catalogue Port (Driving Port / Use Case Interface)
 */
export interface QueryCataloguePort {
  /**
   * Run the query and return one record per data product, in service order
   */
  execute(command: QueryCatalogueCommand): Promise<CatalogueRecord[]>;

  /**
   * Run the query and return the raw rows, for tables that are not data products
   * (e.g. source catalogues)
   */
  fetchRows(command: QueryCatalogueCommand): Promise<CatalogueRow[]>;
}
