import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CreatedJob,
  JobServicePort,
  ResultStream,
} from '../../../application/ports/output/job-service.port';
import {
  DownloadError,
  JobPhaseVO,
  JobSnapshot,
  JobStatusError,
  JobSubmissionError,
  MalformedResponseError,
} from '../../../domain';
import { AppConfig } from '../../../config/configuration';
import {
  FormParams,
  HttpClientService,
  HttpResponse,
  StreamResponse,
  headerValue,
} from '../../../shared/http/http-client.service';
import { UwsJobDocument, parseUwsJob } from '../../../shared/votable/uws.parser';
import { assertAuthorised, isRedirect, isSuccess, lastPathSegment } from './vo-response';

const DISPOSITION_FILENAME = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i;

export function dispositionFileName(header: string | undefined): string | undefined {
  const match = header ? DISPOSITION_FILENAME.exec(header) : null;
  return match ? match[1].trim() : undefined;
}

/**
 * UWS Job Service Adapter
 * Implements JobServicePort against a SODA async endpoint. Job and result
 * URLs carry their own authorisation, so no credentials are sent.
 */
@Injectable()
export class UwsJobServiceAdapter implements JobServicePort {
  private readonly logger = new Logger(UwsJobServiceAdapter.name);

  constructor(
    private readonly httpClient: HttpClientService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async createJob(idTokens: string[], asyncUrl?: string): Promise<CreatedJob> {
    const url = asyncUrl ?? `${this.configService.get('archive', { infer: true }).sodaBaseUrl}data/async`;

    this.logger.debug(`Creating job at ${url} for ${idTokens.length} data product(s)`);
    const response = await this.httpClient.postForm(
      url,
      idTokens.map((token) => ['ID', token] as const),
      { timeout: this.timeout, followRedirects: false },
    );

    assertAuthorised(response);

    const location = headerValue(response.headers, 'location');
    if (isRedirect(response) && location) {
      const jobUrl = new URL(location, url).toString().replace(/\/+$/, '');
      const segment = lastPathSegment(jobUrl);
      const jobId = segment ? decodeURIComponent(segment) : undefined;
      if (!jobId) {
        throw new JobSubmissionError(`Job creation at ${url} redirected to ${location}, which names no job`);
      }
      return { jobId, jobUrl };
    }

    if (isSuccess(response)) {
      const { jobId } = parseUwsJob(response.body);
      return { jobId, jobUrl: `${url.replace(/\/+$/, '')}/${encodeURIComponent(jobId)}` };
    }

    throw new JobSubmissionError(`Job creation at ${url} rejected with HTTP ${response.statusCode}`);
  }

  async addParameters(jobUrl: string, key: string, values: string[]): Promise<void> {
    const response = await this.post(
      `${jobUrl}/parameters`,
      values.map((value) => [key, value] as const),
    );
    this.assertAccepted(response, `Unable to add ${key} parameters to ${jobUrl}`);
  }

  async startJob(jobUrl: string): Promise<void> {
    const response = await this.post(`${jobUrl}/phase`, [['PHASE', 'RUN']]);
    this.assertAccepted(response, `Unable to start job ${jobUrl}`);
  }

  async getJob(jobUrl: string): Promise<JobSnapshot> {
    const response = await this.httpClient.get(jobUrl, {
      timeout: this.timeout,
      maxRetries: this.configService.get('http', { infer: true }).statusMaxRetries,
    });

    assertAuthorised(response);
    if (!isSuccess(response)) {
      throw new JobStatusError(
        jobUrl,
        `Status request for ${jobUrl} failed with HTTP ${response.statusCode}`,
      );
    }

    let document: UwsJobDocument;
    try {
      document = parseUwsJob(response.body);
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        throw new JobStatusError(jobUrl, `Unreadable status for ${jobUrl}: ${error.message}`);
      }
      throw error;
    }
    return {
      jobId: document.jobId,
      phase: JobPhaseVO.fromString(document.phase),
      resultUrls: document.resultUrls.map((href) => new URL(href, jobUrl).toString()),
      errorMessage: document.errorMessage,
    };
  }

  async openResult(url: string): Promise<ResultStream> {
    let response: StreamResponse;
    try {
      response = await this.httpClient.downloadToStream(url, {
        timeout: this.configService.get('http', { infer: true }).downloadTimeoutMs,
      });
    } catch (error) {
      throw new DownloadError(url, error instanceof Error ? error.message : String(error));
    }

    if (!isSuccess(response)) {
      await response.body.dump();
      throw new DownloadError(url, `HTTP ${response.statusCode}`);
    }

    const contentLength = Number(headerValue(response.headers, 'content-length'));
    return {
      stream: response.body,
      fileName: dispositionFileName(headerValue(response.headers, 'content-disposition')),
      contentLength: Number.isFinite(contentLength) ? contentLength : undefined,
    };
  }

  private get timeout(): number {
    return this.configService.get('http', { infer: true }).timeoutMs;
  }

  private post(url: string, params: FormParams): Promise<HttpResponse> {
    return this.httpClient.postForm(url, params, { timeout: this.timeout });
  }

  private assertAccepted(response: HttpResponse, failure: string): void {
    assertAuthorised(response);
    if (!isSuccess(response)) {
      throw new JobSubmissionError(`${failure}: HTTP ${response.statusCode}`);
    }
  }
}
