/**
 * termctx — concurrent, cached, token-budgeted context retrieval.
 *
 * Query terms go in; one bounded text blob per batch comes out. Literature
 * passages are relevance-filtered and cached per term; structured-search
 * summaries share one global token budget.
 */

export * from './errors.js';
export * from './schemas/config.js';
export * from './schemas/outcome.js';
export * from './config/loader.js';
export * from './logging/logger.js';
export * from './tokens/counter.js';
export * from './similarity/tfidf.js';
export * from './similarity/scorer.js';
export * from './cache/lru.js';
export * from './cache/context-cache.js';
export * from './concurrency/exclusive-lock.js';
export * from './concurrency/worker-pool.js';
export * from './retrieval/types.js';
export * from './retrieval/http-client.js';
export * from './retrieval/arxiv-client.js';
export * from './retrieval/fooddata-client.js';
export * from './context/index.js';
