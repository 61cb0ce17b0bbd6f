/**
 * Wiring from a TermContextConfig to ready-to-use pipelines.
 *
 * Each builder constructs its stateful collaborators (cache, lock, scorer
 * memo) once; reuse the returned object across batches to benefit from the
 * cache.
 */

import { ContextCache } from "../cache/context-cache.js";
import { resolveApiKey } from "../config/loader.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { ArxivClient } from "../retrieval/arxiv-client.js";
import { FoodDataClient } from "../retrieval/fooddata-client.js";
import type { FetchLike } from "../retrieval/http-client.js";
import type { TermContextConfig } from "../schemas/config.js";
import { MemoizedScorer } from "../similarity/scorer.js";
import { TiktokenCounter, type TokenCounter } from "../tokens/counter.js";
import { BudgetedAggregator } from "./aggregator.js";
import { ContextOrchestrator } from "./orchestrator.js";
import { ContextResolver } from "./resolver.js";

/** Separator between the structured summaries and the literature context. */
export const COMBINED_SEPARATOR = "\n\n";

export interface BuildOptions {
  logger?: Logger;
  tokens?: TokenCounter;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
  /** Millisecond clock for the context cache. */
  clock?: () => number;
}

export interface LiteraturePipeline {
  resolver: ContextResolver;
  orchestrator: ContextOrchestrator;
  cache: ContextCache;
}

export function createLiteraturePipeline(
  config: TermContextConfig,
  options: BuildOptions = {},
): LiteraturePipeline {
  const logger = options.logger ?? createLogger(config.logLevel);
  const tokens = options.tokens ?? new TiktokenCounter({ logger: logger.child("tokens") });
  const cache = new ContextCache({
    capacity: config.cache.capacity,
    ttlSeconds: config.cache.ttlSeconds,
    clock: options.clock,
  });

  const resolver = new ContextResolver({
    retriever: new ArxivClient({
      baseUrl: config.literature.baseUrl,
      timeoutMs: config.literature.timeoutMs,
      fetchImpl: options.fetchImpl,
      logger: logger.child("arxiv"),
    }),
    scorer: new MemoizedScorer({ capacity: config.scoreCacheSize, logger: logger.child("similarity") }),
    tokens,
    cache,
    settings: {
      maxPages: config.maxPages,
      passageCharLimit: config.passageCharLimit,
      relevanceThreshold: config.relevanceThreshold,
      tokenLimit: config.tokenLimit,
    },
    logger: logger.child("resolver"),
  });

  const orchestrator = new ContextOrchestrator({
    resolver,
    workers: config.workers,
    logger: logger.child("orchestrator"),
  });

  return { resolver, orchestrator, cache };
}

/**
 * Throws ConfigurationError when the API key variable is unset, before any
 * request is made.
 */
export function createFoodAggregator(
  config: TermContextConfig,
  options: BuildOptions = {},
): BudgetedAggregator {
  const logger = options.logger ?? createLogger(config.logLevel);
  const apiKey = resolveApiKey(config.foods, options.env);

  return new BudgetedAggregator({
    retriever: new FoodDataClient({
      apiKey,
      baseUrl: config.foods.baseUrl,
      timeoutMs: config.http.timeoutMs,
      retryAttempts: config.http.retryAttempts,
      backoffFactor: config.http.backoffFactor,
      fetchImpl: options.fetchImpl,
      logger: logger.child("fooddata"),
    }),
    tokens: options.tokens ?? new TiktokenCounter({ logger: logger.child("tokens") }),
    settings: {
      workers: config.workers,
      globalTokenBudget: config.globalTokenBudget,
      timeoutMs: config.http.timeoutMs,
    },
    logger: logger.child("aggregator"),
  });
}

/** Both pipelines over the same terms. */
export class ContextService {
  constructor(
    readonly literature: LiteraturePipeline,
    readonly foods: BudgetedAggregator,
  ) {}

  static fromConfig(config: TermContextConfig, options: BuildOptions = {}): ContextService {
    const logger = options.logger ?? createLogger(config.logLevel);
    const shared = { ...options, logger };
    const foods = createFoodAggregator(config, shared);
    return new ContextService(createLiteraturePipeline(config, shared), foods);
  }

  /** Structured summaries, a blank line, then the literature contexts. */
  async buildContext(terms: readonly string[]): Promise<string> {
    const [foodContext, literatureContext] = await Promise.all([
      this.foods.aggregate(terms),
      this.literature.orchestrator.resolveAll(terms),
    ]);
    return `${foodContext}${COMBINED_SEPARATOR}${literatureContext}`;
  }
}
