import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ArchiveCredentials,
  CatalogueServicePort,
} from '../../../application/ports/output/catalogue-service.port';
import { CatalogueRow, MalformedResponseError, QueryFailedError } from '../../../domain';
import { AppConfig } from '../../../config/configuration';
import {
  FormParams,
  HttpClientService,
  HttpResponse,
} from '../../../shared/http/http-client.service';
import { parseVoTable, queryStatus, resultsTable } from '../../../shared/votable/votable.parser';
import { assertAuthorised, isSuccess } from './vo-response';

/**
 * TAP / SIA2 Catalogue Adapter
 * Implements CatalogueServicePort with synchronous TAP (tap/sync) and SIA2
 * (sia2/query) requests, both authenticated with HTTP Basic auth
 */
@Injectable()
export class TapCatalogueAdapter implements CatalogueServicePort {
  private readonly logger = new Logger(TapCatalogueAdapter.name);

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async queryTap(adql: string, credentials: ArchiveCredentials): Promise<CatalogueRow[]> {
    const url = `${this.voBaseUrl}tap/sync`;
    return this.query(url, credentials, [
      ['REQUEST', 'doQuery'],
      ['LANG', 'ADQL'],
      ['FORMAT', 'votable'],
      ['QUERY', adql],
    ]);
  }

  async querySia(positions: string[], credentials: ArchiveCredentials): Promise<CatalogueRow[]> {
    const url = `${this.voBaseUrl}sia2/query`;
    return this.query(
      url,
      credentials,
      positions.map((position) => ['POS', position] as const),
    );
  }

  private get voBaseUrl(): string {
    return this.configService.get('archive', { infer: true }).voBaseUrl;
  }

  private async query(
    url: string,
    credentials: ArchiveCredentials,
    params: FormParams,
  ): Promise<CatalogueRow[]> {
    const response = await this.httpClient.postForm(url, params, {
      auth: credentials,
      timeout: this.configService.get('http', { infer: true }).timeoutMs,
    });

    assertAuthorised(response);
    if (!isSuccess(response)) {
      throw new QueryFailedError(
        this.serverMessage(response) ?? `Query to ${url} failed with HTTP ${response.statusCode}`,
      );
    }

    const document = parseVoTable(response.body);
    const status = queryStatus(document);
    if (status?.status === 'ERROR') {
      throw new QueryFailedError(status.message ?? `Query to ${url} reported an error`);
    }

    const rows = resultsTable(document)?.rows ?? [];
    this.logger.debug(`${url} returned ${rows.length} row(s)`);
    return rows;
  }

  /** QUERY_STATUS message of an error response, when the body is a VOTable */
  private serverMessage(response: HttpResponse): string | undefined {
    try {
      const status = queryStatus(parseVoTable(response.body));
      return status?.status === 'ERROR' ? status.message : undefined;
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        return undefined;
      }
      throw error;
    }
  }
}
