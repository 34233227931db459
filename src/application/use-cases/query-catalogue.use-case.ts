import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  QueryCatalogueCommand,
  QueryCataloguePort,
} from '../ports/input/query-catalogue.port';
import { CATALOGUE_SERVICE_PORT } from '../ports/output';
import { CatalogueServicePort } from '../ports/output/catalogue-service.port';
import { CatalogueRecord, CatalogueRow } from '../../domain/entities/catalogue-record.entity';

/**
 * Query Catalogue Use Case
 * Runs a TAP or SIA2 query and turns the result rows into catalogue records
 */
@Injectable()
export class QueryCatalogueUseCase implements QueryCataloguePort {
  private readonly logger = new Logger(QueryCatalogueUseCase.name);

  constructor(
    @Inject(CATALOGUE_SERVICE_PORT)
    private readonly catalogueService: CatalogueServicePort,
  ) {}

  async execute(command: QueryCatalogueCommand): Promise<CatalogueRecord[]> {
    const rows = await this.fetchRows(command);
    const records = rows.map((row) => CatalogueRecord.fromRow(row));

    this.logger.log(`Query returned ${records.length} data product(s)`);
    return records;
  }

  async fetchRows(command: QueryCatalogueCommand): Promise<CatalogueRow[]> {
    const { criteria, credentials } = command;

    if (criteria.kind === 'tap') {
      this.logger.debug(`TAP query: ${criteria.adql}`);
      return this.catalogueService.queryTap(criteria.adql, credentials);
    }

    if (criteria.positions.length === 0) {
      return [];
    }
    this.logger.debug(`SIA2 query for ${criteria.positions.length} position(s)`);
    return this.catalogueService.querySia(criteria.positions, credentials);
  }
}
