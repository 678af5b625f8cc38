import { createHash } from 'node:crypto';

import { UnexpectedResponseError } from '@factiva-analytics/contracts';

import type { CredentialProvider } from '../auth/credentials.js';
import type { ClientConfig } from '../config.js';
import { DEFAULT_API_HOST, SDK_VERSION } from '../constants.js';
import type { Logger } from '../logger.js';
import { logger as rootLogger } from '../logger.js';
import { RETRYABLE_STATUS, withRetry } from './retry.js';

export interface TransportResponse {
  statusCode: number;
  /** Parsed JSON body, or undefined when the body is empty or not JSON. */
  body: unknown;
  text: string;
}

/**
 * The three primitive calls the job engine needs. `url` may be absolute (a
 * server-provided self link) or a path relative to the API host.
 */
export interface JobTransport {
  submit(url: string, payload: unknown, headers?: Record<string, string>): Promise<TransportResponse>;
  poll(url: string): Promise<TransportResponse>;
  downloadArtifact(uri: string): Promise<Buffer>;
}

export interface HttpJobTransportOptions {
  credential: CredentialProvider;
  baseUrl?: string;
  timeoutMs?: number;
  /** Attempts for idempotent GETs. Submissions are sent once. */
  retries?: number;
  retryDelayMs?: number;
  fetchImplementation?: typeof fetch;
  logger?: Logger;
}

export class HttpJobTransport implements JobTransport {
  private readonly credential: CredentialProvider;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;
  private readonly log: Logger;

  constructor(options: HttpJobTransportOptions) {
    this.credential = options.credential;
    this.baseUrl = options.baseUrl ?? DEFAULT_API_HOST;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 350;
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
    this.log = options.logger ?? rootLogger.child({ component: 'transport' });

    const checksum = createHash('md5').update(this.credential.fingerprint()).digest('hex');
    this.userAgent = `factiva-analytics-ts/${SDK_VERSION}-${checksum}`;
  }

  async submit(
    url: string,
    payload: unknown,
    headers?: Record<string, string>,
  ): Promise<TransportResponse> {
    const response = await this.request(url, {
      method: 'POST',
      headers: this.buildHeaders(headers),
      body: typeof payload === 'string' ? payload : JSON.stringify(payload),
    });
    return this.toTransportResponse('POST', url, response);
  }

  async poll(url: string): Promise<TransportResponse> {
    return withRetry(
      async () => {
        const response = await this.request(url, { method: 'GET', headers: this.buildHeaders() });
        return this.toTransportResponse('GET', url, response);
      },
      `GET ${url}`,
      {
        tries: this.retries,
        baseDelayMs: this.retryDelayMs,
        retryOnResult: (res) => RETRYABLE_STATUS.has(res.statusCode),
        onRetry: (attempt, reason) => this.log.warn('Retrying GET request', { url, attempt, reason }),
      },
    );
  }

  async downloadArtifact(uri: string): Promise<Buffer> {
    const response = await withRetry(
      () => this.request(uri, { method: 'GET', headers: this.buildHeaders() }),
      `download ${uri}`,
      {
        tries: this.retries,
        baseDelayMs: this.retryDelayMs,
        retryOnResult: (res) => RETRYABLE_STATUS.has(res.status),
        onDiscard: async (res) => {
          await res.body?.cancel();
        },
        onRetry: (attempt, reason) => this.log.warn('Retrying file download', { uri, attempt, reason }),
      },
    );
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new UnexpectedResponseError(response.status, text || response.statusText);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  resolveUrl(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref?.();

    try {
      return await this.fetchImpl(this.resolveUrl(url), { ...init, signal: controller.signal });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`${init.method ?? 'GET'} ${url} timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async toTransportResponse(
    method: string,
    url: string,
    response: Response,
  ): Promise<TransportResponse> {
    const text = await response.text();
    if (response.status >= 400) {
      this.log.error(`${method} request error`, { url, status: response.status, body: text });
    } else {
      this.log.debug(`${method} request completed`, { url, status: response.status });
    }
    return { statusCode: response.status, body: parseJson(text), text };
  }

  private buildHeaders(overrides?: Record<string, string>): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': this.userAgent,
      ...this.credential.headers(),
      ...(overrides ?? {}),
    };
  }
}

/** Transport with the host, timeout and retry settings of a client config. */
export function createHttpTransport(
  credential: CredentialProvider,
  config: ClientConfig,
  logger?: Logger,
): HttpJobTransport {
  return new HttpJobTransport({
    credential,
    baseUrl: config.apiHost,
    timeoutMs: config.http.timeoutMs,
    retries: config.http.retries,
    logger,
  });
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
