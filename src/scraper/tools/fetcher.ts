/**
 * HTTP transport for listing pages, detail pages and media downloads
 */

import { Readable } from 'stream';
import pRetry from 'p-retry';
import { TransportError } from '../../types/errors';
import { logger } from '../../utils/logger';
import { DEFAULT_ACCEPT_LANGUAGE, DEFAULT_USER_AGENT } from '../../config/environment';

export interface Fetcher {
  /** Resolves with the response body; rejects with TransportError. */
  fetchText(url: string): Promise<string>;
  /** Resolves with a stream of the response body; rejects with TransportError. */
  fetchStream(url: string): Promise<Readable>;
}

export interface HttpFetcherOptions {
  timeoutMs?: number;
  retries?: number;
  headers?: Record<string, string>;
  /** Milliseconds before the first retry; doubles each attempt. */
  minRetryDelayMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30000;

interface PendingResponse {
  response: Response;
  /** Stops the request timeout. */
  settle: () => void;
}

export class HttpFetcher implements Fetcher {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly minRetryDelayMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retries = options.retries ?? 2;
    this.minRetryDelayMs = options.minRetryDelayMs ?? 1000;
    this.headers = {
      'User-Agent': DEFAULT_USER_AGENT,
      'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
      ...options.headers
    };
  }

  async fetchText(url: string): Promise<string> {
    const { response, settle } = await this.request(url);
    try {
      return await response.text();
    } catch (error) {
      throw new TransportError(url, this.describeFailure(error, 'Failed to read response body'), { cause: error });
    } finally {
      settle();
    }
  }

  /** The timeout keeps running until the returned stream closes. */
  async fetchStream(url: string): Promise<Readable> {
    const { response, settle } = await this.request(url);
    if (!response.body) {
      settle();
      throw new TransportError(url, 'Response has no body', { status: response.status });
    }
    const stream = Readable.fromWeb(response.body);
    stream.once('close', settle);
    return stream;
  }

  private describeFailure(error: unknown, fallback: string): string {
    if (error instanceof Error && error.name === 'AbortError') {
      return `Request timeout after ${this.timeoutMs}ms`;
    }
    return error instanceof Error ? error.message : fallback;
  }

  private async request(url: string): Promise<PendingResponse> {
    try {
      return await pRetry(() => this.attempt(url), {
        retries: this.retries,
        factor: 2,
        minTimeout: this.minRetryDelayMs,
        maxTimeout: this.minRetryDelayMs * 8,
        onFailedAttempt: (error) => {
          if (error.retriesLeft > 0) {
            logger.debug(`Fetch attempt ${error.attemptNumber} failed for ${url}: ${error.message}`);
          }
        }
      });
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(url, error instanceof Error ? error.message : 'Unknown error', { cause: error });
    }
  }

  /**
   * One request. On success the timeout is still armed so it also covers the
   * body; the caller settles it once the body is consumed.
   */
  private async attempt(url: string): Promise<PendingResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const settle = () => clearTimeout(timeout);

    let response: Response;
    try {
      response = await fetch(url, { headers: this.headers, signal: controller.signal });
    } catch (error) {
      settle();
      throw new TransportError(url, this.describeFailure(error, 'Unknown error'), { cause: error });
    }

    if (!response.ok) {
      settle();
      const failure = new TransportError(url, `HTTP ${response.status}: ${response.statusText}`, {
        status: response.status
      });
      // Client errors will not change on retry
      if (response.status < 500 && response.status !== 429) {
        throw new pRetry.AbortError(failure);
      }
      throw failure;
    }

    return { response, settle };
  }
}
