/**
 * src/shared/http/request-client.ts
 *
 * WHY:
 * - Single place that turns HTTP responses and transport failures into AppError codes.
 * - Owns the per-request timeout and the bounded retry policy, so API modules
 *   (modules/okta) only describe endpoints.
 *
 * CLASSIFICATION:
 * - network failure / timeout / 5xx   -> TRANSIENT (retried for GET only)
 * - 429                               -> RATE_LIMITED (retried after Retry-After)
 * - 401 / 403                         -> FATAL (never retried)
 * - 404                               -> NOT_FOUND
 * - other 4xx                         -> VALIDATION_ERROR
 * - caller abort                      -> CANCELLED
 * - transport failures cover the whole exchange, body included.
 *
 * RULES:
 * - `fetchFn` is injected (tests pass an in-process fake; production uses global fetch).
 * - Never log the Authorization header.
 */

import type { Logger } from '../logger/logger';
import { AppError, isAppError } from '../errors/errors';
import { withRetry } from '../concurrency/retry';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type HttpResponse = {
  status: number;
  headers: Headers;
  body: unknown;
};

export type RequestRetryPolicy = {
  /** Total attempts for transient failures of GET requests. */
  transientAttempts: number;
  /** How many times a 429 is waited out before it surfaces. */
  rateLimitRetries: number;
  baseDelayMs: number;
  /** Used when a 429 carries neither Retry-After nor X-Rate-Limit-Reset. */
  defaultRateLimitDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RequestRetryPolicy = {
  transientAttempts: 3,
  rateLimitRetries: 5,
  baseDelayMs: 500,
  defaultRateLimitDelayMs: 1_000,
};

export type RequestClientOptions = {
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retry?: Partial<RequestRetryPolicy>;
  fetchFn?: typeof fetch;
  logger?: Logger;
  now?: () => number;
};

export type RequestOptions = {
  query?: QueryParams;
  body?: unknown;
  signal?: AbortSignal;
};

/** Reads a string field of an Okta error body ({ errorCode, errorSummary, ... }). */
function errorField(body: unknown, field: 'errorCode' | 'errorSummary'): string | undefined {
  if (!body || typeof body !== 'object' || !(field in body)) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}

export function retryAfterMs(headers: Headers, now: number, fallbackMs: number): number {
  const retryAfter = headers.get('retry-after');
  if (retryAfter !== null && retryAfter.trim() !== '') {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

    const at = Date.parse(retryAfter);
    if (!Number.isNaN(at)) return Math.max(0, at - now);
  }

  const reset = headers.get('x-rate-limit-reset');
  if (reset !== null && reset.trim() !== '') {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) return Math.max(0, epochSeconds * 1000 - now);
  }

  return fallbackMs;
}

export function classifyStatus(
  status: number,
  body: unknown,
  headers: Headers,
  ctx: { method: HttpMethod; path: string; now: number; defaultRateLimitDelayMs: number },
): AppError {
  const meta = { method: ctx.method, path: ctx.path, status, errorCode: errorField(body, 'errorCode') };
  const summary = errorField(body, 'errorSummary');

  if (status === 429) {
    return AppError.rateLimited(retryAfterMs(headers, ctx.now, ctx.defaultRateLimitDelayMs), meta);
  }
  if (status === 401) {
    return AppError.fatal(summary ?? 'Authentication failed: check the API token', meta);
  }
  if (status === 403) {
    return AppError.fatal(summary ?? 'Permission denied by the remote API', meta);
  }
  if (status === 404) {
    return AppError.notFound(summary ?? 'Resource not found', meta);
  }
  if (status >= 500) {
    return AppError.transient(summary ?? `Remote API error (HTTP ${status})`, meta);
  }
  return AppError.validationError(summary ?? `Request rejected (HTTP ${status})`, meta);
}

export class RequestClient {
  private readonly baseUrl: string;
  private readonly retry: RequestRetryPolicy;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly opts: RequestClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.retry = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.fetchFn = opts.fetchFn ?? fetch;
    this.now = opts.now ?? Date.now;
  }

  get(path: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    return this.send('GET', path, opts);
  }

  post(path: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    return this.send('POST', path, opts);
  }

  delete(path: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    return this.send('DELETE', path, opts);
  }

  buildUrl(path: string, query?: QueryParams): URL {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url;
  }

  async send(method: HttpMethod, path: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    let rateLimitRetries = 0;

    return withRetry(() => this.sendOnce(method, path, opts), {
      attempts: this.retry.transientAttempts + this.retry.rateLimitRetries,
      baseDelayMs: this.retry.baseDelayMs,
      signal: opts.signal,
      shouldRetry: (err, attempt) => {
        if (!isAppError(err)) return false;
        if (err.code === 'RATE_LIMITED') {
          rateLimitRetries += 1;
          return rateLimitRetries <= this.retry.rateLimitRetries;
        }
        if (err.code === 'TRANSIENT' && method === 'GET') {
          return attempt - rateLimitRetries < this.retry.transientAttempts;
        }
        return false;
      },
      delayFor: (err) => (isAppError(err) ? err.retryAfterMs : undefined),
      onRetry: (err, attempt, delayMs) => {
        this.opts.logger?.warn('http.request.retry', {
          method,
          path,
          attempt,
          delayMs,
          code: isAppError(err) ? err.code : undefined,
        });
      },
    });
  }

  private async sendOnce(method: HttpMethod, path: string, opts: RequestOptions): Promise<HttpResponse> {
    const url = this.buildUrl(path, opts.query);
    const timeout = AbortSignal.timeout(this.opts.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.opts.headers,
    };
    if (opts.body !== undefined) headers['Content-Type'] = 'application/json';

    this.opts.logger?.debug('http.request', { method, url: url.toString() });

    let res: Response;
    let body: unknown;
    try {
      res = await this.fetchFn(url, {
        method,
        headers,
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        signal,
      });
      body = await this.readBody(res);
    } catch (err) {
      throw this.transportFailure(err, { method, path, callerSignal: opts.signal, timeout });
    }

    if (!res.ok) {
      throw classifyStatus(res.status, body, res.headers, {
        method,
        path,
        now: this.now(),
        defaultRateLimitDelayMs: this.retry.defaultRateLimitDelayMs,
      });
    }

    return { status: res.status, headers: res.headers, body };
  }

  private transportFailure(
    err: unknown,
    ctx: { method: HttpMethod; path: string; callerSignal?: AbortSignal; timeout: AbortSignal },
  ): AppError {
    const meta = { method: ctx.method, path: ctx.path };
    if (ctx.callerSignal?.aborted) return AppError.cancelled('Request cancelled', meta);
    if (ctx.timeout.aborted) {
      return AppError.transient(`Request timed out after ${this.opts.timeoutMs}ms`, meta, err);
    }
    return AppError.transient('Network error while calling the remote API', meta, err);
  }

  private async readBody(res: Response): Promise<unknown> {
    const text = await res.text();
    if (text === '') return undefined;

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      // non-JSON bodies (HTML error pages from proxies) are kept as text
      return text;
    }
  }
}
