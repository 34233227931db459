import { Injectable } from '@nestjs/common';
import {
  ArchiveCredentials,
  CatalogueServicePort,
} from '../../src/application/ports/output/catalogue-service.port';
import { CatalogueRow } from '../../src/domain/entities/catalogue-record.entity';

/**
 * In-Memory Catalogue Service Adapter
 * Answers every TAP query with the rows registered for it, and SIA2 queries with siaRows
 */
@Injectable()
export class InMemoryCatalogueServiceAdapter implements CatalogueServicePort {
  private readonly tapRows = new Map<string, CatalogueRow[]>();
  private siaRows: CatalogueRow[] = [];
  private readonly queries: string[] = [];

  async queryTap(adql: string, _credentials: ArchiveCredentials): Promise<CatalogueRow[]> {
    this.queries.push(adql);
    return this.tapRows.get(adql) ?? [];
  }

  async querySia(positions: string[], _credentials: ArchiveCredentials): Promise<CatalogueRow[]> {
    this.queries.push(...positions);
    return this.siaRows;
  }

  setTapRows(adql: string, rows: CatalogueRow[]): void {
    this.tapRows.set(adql, rows);
  }

  setSiaRows(rows: CatalogueRow[]): void {
    this.siaRows = rows;
  }

  getQueries(): string[] {
    return [...this.queries];
  }
}
