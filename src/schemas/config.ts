/**
 * termctx configuration schema.
 *
 * Every field has a default, so an empty object (or no config file at all)
 * yields a complete configuration.
 */

import { z } from "zod";

export const LogLevel = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

/** Per-key context cache. */
export const CacheConfig = z.object({
  /** Max entries before least-recently-used eviction. */
  capacity: z.number().int().positive().default(1000),
  /** Seconds an entry stays valid after insertion. */
  ttlSeconds: z.number().positive().default(3600),
});
export type CacheConfig = z.infer<typeof CacheConfig>;

/** Retrying HTTP client used by the structured-search source. */
export const HttpConfig = z.object({
  /** Per-request timeout (ms). */
  timeoutMs: z.number().int().positive().default(5000),
  /** Retries after the first attempt. */
  retryAttempts: z.number().int().nonnegative().default(3),
  /** Base backoff in seconds; retry n waits factor * 2^(n-1). */
  backoffFactor: z.number().nonnegative().default(0.5),
});
export type HttpConfig = z.infer<typeof HttpConfig>;

/** arXiv literature source. */
export const LiteratureConfig = z.object({
  baseUrl: z.string().url().default("http://export.arxiv.org/api/query"),
  /** Per-request timeout (ms). */
  timeoutMs: z.number().int().positive().default(30_000),
});
export type LiteratureConfig = z.infer<typeof LiteratureConfig>;

/** FoodData Central structured-search source. */
export const FoodsConfig = z.object({
  baseUrl: z.string().url().default("https://api.nal.usda.gov/fdc/v1/foods/search"),
  /** Environment variable holding the API key. */
  apiKeyEnv: z.string().min(1).default("FOODDATA_API_KEY"),
});
export type FoodsConfig = z.infer<typeof FoodsConfig>;

/** Top-level termctx configuration. */
export const TermContextConfig = z.object({
  /** Worker pool size for per-term fan-out. */
  workers: z.number().int().positive().default(5),
  /** Token cap for one resolved literature context. */
  tokenLimit: z.number().int().positive().default(200),
  /** Token cap shared by all accepted structured-search summaries in a batch. */
  globalTokenBudget: z.number().int().positive().default(128_000),
  /** Minimum similarity score for a passage to be kept. */
  relevanceThreshold: z.number().min(0).max(1).default(0.2),
  /** Passages fetched per term. */
  maxPages: z.number().int().positive().default(2),
  /** Characters kept from each passage before scoring. */
  passageCharLimit: z.number().int().positive().default(1000),
  /** Memoized (term, passage) similarity pairs. */
  scoreCacheSize: z.number().int().positive().default(100),
  cache: CacheConfig.default({}),
  http: HttpConfig.default({}),
  literature: LiteratureConfig.default({}),
  foods: FoodsConfig.default({}),
  logLevel: LogLevel.default("info"),
});
export type TermContextConfig = z.infer<typeof TermContextConfig>;

/** Input shape accepted by the schema (every field optional). */
export type TermContextConfigInput = z.input<typeof TermContextConfig>;
