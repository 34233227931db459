import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Dispatcher, request } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

export const HTTP_DISPATCHER = Symbol('HttpDispatcher');

export interface BasicCredentials {
  username: string;
  password: string;
}

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  auth?: BasicCredentials;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  /** Defaults to true. When false, 3xx responses are returned as-is. */
  followRedirects?: boolean;
}

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: string;
  /** Final URL after redirects. */
  url: string;
}

export interface StreamResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: Dispatcher.ResponseData['body'];
  url: string;
}

export type FormParams = ReadonlyArray<readonly [string, string]>;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 5;

export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function basicAuthorization(credentials: BasicCredentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  return `Basic ${token}`;
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly defaultTimeout = 60000;
  private readonly defaultMaxRetries = 0;
  private readonly defaultRetryDelay = 1000;

  constructor(
    private readonly logger: PinoLoggerService,
    @Inject(HTTP_DISPATCHER) private readonly dispatcher: Dispatcher,
  ) {
    this.logger.setContext(HttpClientService.name);
  }

  /**
   * Send a request and read the whole body as text. Only network failures are
   * retried; an HTTP error status is returned to the caller.
   */
  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelay ?? this.defaultRetryDelay;

    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.send(url, options);
        const body = await response.body.text();

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body,
          url: response.url,
        };
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);

        if (attempt < maxRetries) {
          this.logger.warn({ url, attempt, error: message }, 'HTTP request failed, retrying');
          await this.delay(retryDelay * Math.pow(2, attempt));
        }
      }
    }

    throw lastError;
  }

  /**
   * Send a request and hand back the unread body stream. The caller owns the
   * stream and must consume or dump it.
   */
  async requestStream(url: string, options: HttpRequestOptions = {}): Promise<StreamResponse> {
    const response = await this.send(url, options);

    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
      url: response.url,
    };
  }

  async get(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async postForm(
    url: string,
    params: FormParams,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    const body = new URLSearchParams(params.map(([key, value]): [string, string] => [key, value])).toString();

    return this.request(url, {
      ...options,
      method: 'POST',
      body,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        ...options?.headers,
      },
    });
  }

  async downloadToStream(
    url: string,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<StreamResponse> {
    return this.requestStream(url, { ...options, method: 'GET' });
  }

  async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  private async send(
    url: string,
    options: HttpRequestOptions,
  ): Promise<Dispatcher.ResponseData & { url: string }> {
    const followRedirects = options.followRedirects ?? true;
    const timeout = options.timeout ?? this.defaultTimeout;
    const origin = new URL(url).origin;

    let currentUrl = url;
    let method: Dispatcher.HttpMethod = options.method ?? 'GET';
    let body = options.body;
    let headers = { ...options.headers };

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      // Credentials only travel to the origin they were given for
      const sameOrigin = new URL(currentUrl).origin === origin;
      const requestHeaders =
        options.auth && sameOrigin
          ? { ...headers, Authorization: basicAuthorization(options.auth) }
          : headers;

      this.logger.debug({ url: currentUrl, method }, 'HTTP request');

      const response = await request(currentUrl, {
        dispatcher: this.dispatcher,
        method,
        headers: requestHeaders,
        body,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const location = headerValue(response.headers, 'location');
      if (!followRedirects || !REDIRECT_STATUSES.has(response.statusCode) || !location) {
        return Object.assign(response, { url: currentUrl });
      }

      await response.body.dump();
      currentUrl = new URL(location, currentUrl).toString();

      if (response.statusCode === 303 || (method === 'POST' && response.statusCode !== 307 && response.statusCode !== 308)) {
        method = 'GET';
        body = undefined;
        headers = Object.fromEntries(
          Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'content-type'),
        );
      }
    }

    throw new Error(`Too many redirects requesting ${url}`);
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
