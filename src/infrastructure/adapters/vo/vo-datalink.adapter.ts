import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ArchiveCredentials } from '../../../application/ports/output/catalogue-service.port';
import { DatalinkPort, ServiceLink } from '../../../application/ports/output/datalink.port';
import { CatalogueRecord, QueryFailedError } from '../../../domain';
import { AppConfig } from '../../../config/configuration';
import { HttpClientService } from '../../../shared/http/http-client.service';
import {
  VoTableDocument,
  findResource,
  paramValue,
  parseVoTable,
  resultsTable,
} from '../../../shared/votable/votable.parser';
import { assertAuthorised, isSuccess } from './vo-response';

const AUTHENTICATED_LINK_DESCRIPTION = 'Authenticated Data Link';

/**
 * VO DataLink Adapter
 * Implements DatalinkPort. A record's DataLink document may only point at an
 * authenticated DataLink endpoint; that document is then fetched and read instead.
 */
@Injectable()
export class VoDatalinkAdapter implements DatalinkPort {
  private readonly logger = new Logger(VoDatalinkAdapter.name);

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async resolveService(
    record: CatalogueRecord,
    serviceName: string,
    credentials: ArchiveCredentials,
  ): Promise<ServiceLink | null> {
    const voBaseUrl = this.configService.get('archive', { infer: true }).voBaseUrl;
    const url = record.datalinkUrl ?? `${voBaseUrl}datalink/links?ID=${encodeURIComponent(record.id)}`;

    let document = await this.fetchDocument(url, credentials);
    const authenticatedUrl = this.authenticatedLink(document);
    if (authenticatedUrl && authenticatedUrl !== url) {
      this.logger.debug(`Following authenticated DataLink for ${record.id}`);
      document = await this.fetchDocument(authenticatedUrl, credentials);
    }

    const rows = resultsTable(document)?.rows ?? [];
    const serviceRow = rows.find(
      (row) => row.service_def === serviceName && (row.authenticated_id_token ?? '').length > 0,
    );
    if (!serviceRow) {
      return null;
    }

    const descriptor = findResource(document, 'meta', serviceName);
    const accessUrl = descriptor ? paramValue(descriptor, 'accessURL') : undefined;

    return {
      serviceName,
      idToken: serviceRow.authenticated_id_token,
      accessUrl: accessUrl || undefined,
    };
  }

  private async fetchDocument(
    url: string,
    credentials: ArchiveCredentials,
  ): Promise<VoTableDocument> {
    const response = await this.httpClient.get(url, {
      auth: credentials,
      timeout: this.configService.get('http', { infer: true }).timeoutMs,
    });

    assertAuthorised(response);
    if (!isSuccess(response)) {
      throw new QueryFailedError(`DataLink request ${url} failed with HTTP ${response.statusCode}`);
    }
    return parseVoTable(response.body);
  }

  private authenticatedLink(document: VoTableDocument): string | undefined {
    const rows = resultsTable(document)?.rows ?? [];
    const row = rows.find((candidate) => candidate.description === AUTHENTICATED_LINK_DESCRIPTION);
    return row?.access_url || undefined;
  }
}
