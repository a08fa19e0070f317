/**
 * Forge HTTP Client
 *
 * Thin JSON client shared by the platform adapters. Every request goes
 * through the adapter's RateLimiter, feeds the advertised quota back into
 * it, validates the payload with zod and maps failures onto the transfer
 * error taxonomy.
 */

import { z } from 'zod';
import type { RateLimiter, QuotaUpdate } from './rate-limiter.js';
import {
  ApiError,
  AuthenticationError,
  NotFoundError,
  PermanentWriteError,
  RateLimitError,
  TransientApiError,
  TransientWriteError,
  TransferCancelledError,
  errorMessage,
  type ApiErrorDetails,
} from './errors.js';

// ─── Types ───────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type Query = Record<string, string | number | undefined>;

export interface ForgeHttpClientConfig {
  /** API root, without trailing slash */
  baseUrl: string;
  headers: Record<string, string>;
  limiter: RateLimiter;
  /** Prefix of the quota headers: 'x-ratelimit-' (GitHub) or 'ratelimit-' (GitLab) */
  quotaHeaderPrefix: string;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Cancels rate-limit waits and in-flight reads */
  signal?: AbortSignal;
}

export interface RequestOptions {
  query?: Query;
  body?: unknown;
}

export interface HttpResponse<T> {
  data: T;
  status: number;
  headers: Headers;
}

/** GitHub asks clients to wait at least a minute after a secondary rate limit */
export const SECONDARY_RATE_LIMIT_WAIT_MS = 60_000;

const ErrorBodySchema = z
  .object({
    message: z.string().optional(),
    error: z.string().optional(),
    errors: z.array(z.object({ code: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

// ─── Client ──────────────────────────────────────────────────

export class ForgeHttpClient {
  private readonly config: ForgeHttpClientConfig;
  private readonly timeoutMs: number;

  constructor(config: ForgeHttpClientConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
    this.timeoutMs = config.timeoutMs ?? 30_000;
  }

  get limiter(): RateLimiter {
    return this.config.limiter;
  }

  async get<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.request(schema, 'GET', path, options);
    return response.data;
  }

  /**
   * Issue a request under the rate limiter's retry policy.
   */
  async request<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<HttpResponse<T>> {
    const { signal } = this.config;
    return this.config.limiter.execute(() => this.send(schema, method, path, options, signal), signal);
  }

  /**
   * Lazily walk every page of a list endpoint.
   *
   * Follows GitLab's `x-next-page` header when present, otherwise GitHub's
   * `Link: rel="next"`.
   */
  async *paginate<T>(
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    path: string,
    query: Query = {},
    perPage = 100,
  ): AsyncGenerator<T, void, undefined> {
    const pageSchema = z.array(itemSchema);
    let page: number | null = 1;

    while (page !== null) {
      const response: HttpResponse<T[]> = await this.request(pageSchema, 'GET', path, {
        query: { ...query, per_page: perPage, page },
      });
      yield* response.data;
      page = nextPage(response.headers, page);
    }
  }

  // ─── Internals ─────────────────────────────────────────────

  private async send<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    signal?: AbortSignal,
  ): Promise<HttpResponse<T>> {
    const isWrite = method !== 'GET';
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = { Accept: 'application/json', ...this.config.headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: this.requestSignal(isWrite, signal),
      });
    } catch (err) {
      if (!isWrite && signal?.aborted) {
        throw new TransferCancelledError();
      }
      const message = `${method} ${path} failed: ${errorMessage(err)}`;
      throw isWrite ? new TransientWriteError(message, { cause: err }) : new TransientApiError(message, { cause: err });
    }

    const quota = this.readQuota(response.headers);
    if (quota) {
      this.config.limiter.update(quota);
    }

    if (!response.ok) {
      throw await this.toError(method, path, response);
    }

    const text = await response.text();
    let json: unknown = null;
    if (text) {
      try {
        json = JSON.parse(text);
      } catch (err) {
        throw new ApiError(`Unreadable response from ${method} ${path}: ${errorMessage(err)}`, {
          status: response.status,
          cause: err,
        });
      }
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ApiError(`Unexpected response from ${method} ${path}${where}: ${issue?.message ?? 'invalid payload'}`, {
        status: response.status,
      });
    }

    return { data: parsed.data, status: response.status, headers: response.headers };
  }

  /**
   * Reads stop as soon as the transfer is cancelled. A write already sent
   * runs to completion so its result can still be recorded.
   */
  private requestSignal(isWrite: boolean, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal && !isWrite ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private buildUrl(path: string, query: Query = {}): string {
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private readQuota(headers: Headers): QuotaUpdate | null {
    const prefix = this.config.quotaHeaderPrefix;
    const remaining = headers.get(`${prefix}remaining`);
    const reset = headers.get(`${prefix}reset`);
    if (remaining === null || reset === null) {
      return null;
    }
    const limit = headers.get(`${prefix}limit`);
    return {
      limit: limit !== null ? Number(limit) : undefined,
      remaining: Number(remaining),
      resetAt: Number(reset) * 1000,
    };
  }

  private async toError(method: HttpMethod, path: string, response: Response): Promise<ApiError> {
    const status = response.status;
    const isWrite = method !== 'GET';
    const reason = await readErrorText(response);
    const message = `${method} ${path} → ${status}: ${reason}`;
    const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
    const details: ApiErrorDetails = { status, retryAfterMs };
    const exhausted = response.headers.get(`${this.config.quotaHeaderPrefix}remaining`) === '0';

    if (status === 429 || (status === 403 && (exhausted || retryAfterMs !== undefined))) {
      return new RateLimitError(message, details);
    }
    // Secondary rate limits leave the primary quota untouched
    if (status === 403 && /rate limit/i.test(reason)) {
      return new RateLimitError(message, { status, retryAfterMs: SECONDARY_RATE_LIMIT_WAIT_MS });
    }
    if (status === 401 || status === 403) {
      return new AuthenticationError(message, details);
    }
    if (status === 404) {
      return new NotFoundError(message, details);
    }
    if (status === 408 || status >= 500) {
      return isWrite ? new TransientWriteError(message, details) : new TransientApiError(message, details);
    }
    if (isWrite && status >= 400 && status < 500) {
      return new PermanentWriteError(message, details);
    }
    return new ApiError(message, details);
  }
}

// ─── Helpers ─────────────────────────────────────────────────

async function readErrorText(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) {
    return response.statusText || 'request failed';
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return text.slice(0, 200);
  }

  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success) {
    return text.slice(0, 200);
  }

  const base = parsed.data.message ?? parsed.data.error ?? (response.statusText || 'request failed');
  const codes = (parsed.data.errors ?? [])
    .map((e) => e.code)
    .filter((code): code is string => typeof code === 'string');
  return codes.length > 0 ? `${base} (${codes.join(', ')})` : base;
}

/**
 * `Retry-After` in seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export function nextPage(headers: Headers, current: number): number | null {
  const gitlabNext = headers.get('x-next-page');
  if (gitlabNext !== null) {
    const next = Number(gitlabNext);
    return gitlabNext.trim() !== '' && Number.isInteger(next) && next > current ? next : null;
  }

  const link = headers.get('link');
  if (link && /rel="next"/.test(link)) {
    return current + 1;
  }
  return null;
}
