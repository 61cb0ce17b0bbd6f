/**
 * HTTP GET client with per-request timeout and exponential-backoff retry.
 *
 * Retries only transient statuses and connection-level failures; any other
 * non-2xx status fails on the first attempt. Safe to share across concurrent
 * tasks: it holds no per-request state.
 */

import { setTimeout as delay } from "node:timers/promises";
import { HttpRequestError, HttpStatusError, describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** Upper bound on a server-requested Retry-After wait. */
const MAX_RETRY_AFTER_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean>;

export interface RetryingHttpClientOptions {
  /** Retries after the first attempt (default 3). */
  retryAttempts?: number;
  /** Base backoff in seconds; retry n waits factor * 2^(n-1) (default 0.5). */
  backoffFactor?: number;
  /** Per-request timeout in ms (default 5000). */
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface RequestOptions {
  params?: QueryParams;
  /** Overrides the client default for this request. */
  timeoutMs?: number;
}

/** Delay before retry number `retry` (1-based), in ms. */
export function backoffDelayMs(backoffFactor: number, retry: number): number {
  return backoffFactor * 2 ** (retry - 1) * 1000;
}

/** Build `url?params` with the params URL-encoded. */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return `${url}${url.includes("?") ? "&" : "?"}${search.toString()}`;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) return undefined;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

export class RetryingHttpClient {
  readonly retryAttempts: number;
  readonly backoffFactor: number;
  readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: RetryingHttpClientOptions = {}) {
    this.retryAttempts = options.retryAttempts ?? 3;
    this.backoffFactor = options.backoffFactor ?? 0.5;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? silentLogger;
  }

  /** GET and return the body as text. Throws HttpStatusError / HttpRequestError. */
  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.send(buildUrl(url, options.params), options.timeoutMs ?? this.timeoutMs);
    return response.text();
  }

  /** GET and parse the body as JSON; an empty body parses as null. */
  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const text = await this.getText(url, options);
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new Error(`Response from ${url} was not valid JSON`, { cause: err });
    }
  }

  private async send(url: string, timeoutMs: number): Promise<Response> {
    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.retryAttempts;
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: { Accept: "application/json", ...this.headers },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        const failure = new HttpRequestError(url, `Request to ${url} failed: ${describeError(err)}`, {
          cause: err,
        });
        if (!canRetry) throw failure;
        await this.waitBeforeRetry(attempt + 1, failure.message);
        continue;
      }

      if (response.ok) return response;

      if (!canRetry || !RETRYABLE_STATUSES.has(response.status)) {
        await response.body?.cancel();
        throw new HttpStatusError(
          response.status,
          url,
          `Request to ${url} failed (${response.status} ${response.statusText})`,
        );
      }
      // Drain the body so the connection can be reused.
      await response.text().catch(() => "");
      await this.waitBeforeRetry(
        attempt + 1,
        `status ${response.status}`,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }
  }

  private async waitBeforeRetry(retry: number, reason: string, retryAfterMs?: number): Promise<void> {
    const waitMs = retryAfterMs ?? backoffDelayMs(this.backoffFactor, retry);
    this.logger.debug(`Retrying (${retry}/${this.retryAttempts}) after ${reason}`, { waitMs });
    await this.sleep(waitMs);
  }
}
