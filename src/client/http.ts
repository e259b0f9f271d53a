import { HTTP_DEFAULTS, type HttpRetryConfig } from '../config/constants.js';
import { TransportError } from '../errors/index.js';
import { sleep } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';

export interface HttpClientConfig {
  headers?: Record<string, string>;
  /** Per-request deadline in milliseconds */
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  logger?: Logger;
}

export interface HttpRequest {
  url: string;
  query?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  /** Response body as text */
  data: string;
}

/**
 * Text-oriented GET client over global fetch.
 * Network errors and 5xx responses are retried up to retry.maxAttempts;
 * every other non-2xx status fails immediately. Failures throw TransportError.
 */
export class HttpClient {
  private config: HttpClientConfig;

  constructor(config: HttpClientConfig = {}) {
    this.config = config;
  }

  async get(req: HttpRequest): Promise<HttpResponse> {
    const url = this.buildUrl(req.url, req.query);
    const headers: Record<string, string> = {
      Accept: HTTP_DEFAULTS.ACCEPT,
      ...this.config.headers,
    };

    const retry = this.config.retry;
    const maxAttempts = Math.max(1, retry?.maxAttempts ?? HTTP_DEFAULTS.MAX_ATTEMPTS);
    const initialDelay = retry?.initialDelay ?? HTTP_DEFAULTS.INITIAL_DELAY_MS;
    const timeoutMs = this.config.timeoutMs ?? HTTP_DEFAULTS.TIMEOUT_MS;

    let lastError: TransportError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = this.calculateDelay(attempt - 1, initialDelay);
        this.config.logger?.debug(`Retrying ${url} (attempt ${attempt}/${maxAttempts}) in ${delay}ms`);
        await sleep(delay);
      }

      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        lastError = new TransportError(describeFetchFailure(error, timeoutMs), { url, cause: error });
        continue;
      }

      if (!response.ok) {
        const statusText = response.statusText ? ` ${response.statusText}` : '';
        lastError = new TransportError(`HTTP ${response.status}${statusText}`, {
          status: response.status,
          url,
        });
        // Only server errors are worth another attempt
        if (response.status >= 500) {
          continue;
        }
        throw lastError;
      }

      let data: string;
      try {
        data = await response.text();
      } catch (error) {
        lastError = new TransportError(describeFetchFailure(error, timeoutMs), { url, cause: error });
        continue;
      }

      return {
        status: response.status,
        data,
      };
    }

    throw lastError ?? new TransportError('Request failed after all retries', { url });
  }

  private buildUrl(base: string, query?: Record<string, string>): string {
    if (!query || Object.keys(query).length === 0) {
      return base;
    }
    const params = new URLSearchParams(query);
    const separator = base.includes('?') ? '&' : '?';
    return `${base}${separator}${params.toString()}`;
  }

  /**
   * Exponential backoff with ±10% jitter, capped at HTTP_DEFAULTS.MAX_DELAY_MS
   */
  private calculateDelay(retryNumber: number, initialDelay: number): number {
    const delay = initialDelay * Math.pow(2, retryNumber - 1);
    const jitter = delay * 0.1 * (Math.random() * 2 - 1);
    return Math.round(Math.min(delay + jitter, HTTP_DEFAULTS.MAX_DELAY_MS));
  }
}

function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return `Request timed out after ${timeoutMs}ms`;
    }
    return `Request failed: ${error.message}`;
  }
  return `Request failed: ${String(error)}`;
}
