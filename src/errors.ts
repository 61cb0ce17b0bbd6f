/**
 * Error types raised by termctx.
 *
 * Only ConfigurationError ever reaches a caller of the public API. The HTTP
 * errors are raised inside the retrying client and converted into `failed`
 * outcomes by the retrieval clients.
 */

export type ConfigurationErrorCode = "CONFIG_MISSING_CREDENTIAL" | "CONFIG_INVALID";

/** Fatal configuration problem (missing credential, invalid config file). */
export class ConfigurationError extends Error {
  constructor(
    public readonly code: ConfigurationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Non-2xx response from an upstream HTTP API. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    message?: string,
  ) {
    super(message ?? `Request failed with status ${status}`);
    this.name = "HttpStatusError";
  }
}

/** Connection-level failure: refused, reset, DNS, or timed out. */
export class HttpRequestError extends Error {
  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HttpRequestError";
  }
}

/** Render any thrown value as a one-line reason. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
