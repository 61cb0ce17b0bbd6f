/**
 * Similarity scorer with a bounded memo of (term, passage) pairs.
 */

import { LruMap } from "../cache/lru.js";
import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { tfidfCosine } from "./tfidf.js";

export interface SimilarityScorer {
  /** Relevance of `passage` to `term` in [0, 1]; 0 on any internal failure. */
  score(term: string, passage: string): number;
}

export type SimilarityFunction = (a: string, b: string) => number;

export interface MemoizedScorerOptions {
  /** Max memoized pairs (default 100). */
  capacity?: number;
  /** Pairwise similarity; defaults to TF-IDF cosine. */
  similarity?: SimilarityFunction;
  logger?: Logger;
}

export class MemoizedScorer implements SimilarityScorer {
  private readonly memo: LruMap<string, number>;
  private readonly similarity: SimilarityFunction;
  private readonly logger: Logger;

  constructor(options: MemoizedScorerOptions = {}) {
    this.memo = new LruMap(options.capacity ?? 100);
    this.similarity = options.similarity ?? tfidfCosine;
    this.logger = options.logger ?? silentLogger;
  }

  get memoSize(): number {
    return this.memo.size;
  }

  score(term: string, passage: string): number {
    const key = JSON.stringify([term, passage]);
    const cached = this.memo.get(key);
    if (cached !== undefined) return cached;

    let value: number;
    try {
      value = this.similarity(term, passage);
      if (!Number.isFinite(value)) {
        throw new Error(`similarity returned ${value}`);
      }
    } catch (err) {
      this.logger.error("Error computing similarity", { term, error: describeError(err) });
      return 0;
    }

    this.memo.set(key, value);
    return value;
  }
}
