/**
 * Literature context resolver — one term to one bounded context string.
 *
 * Pipeline: cache → fetch → per-passage char cap → relevance filter →
 * join → token truncation → cache.
 */

import type { ContextCache } from "../cache/context-cache.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { CandidatePassage, PassageRetriever } from "../retrieval/types.js";
import { valueOr } from "../schemas/outcome.js";
import type { SimilarityScorer } from "../similarity/scorer.js";
import type { TokenCounter } from "../tokens/counter.js";

export const PASSAGE_SEPARATOR = "\n\n";

export interface ResolverSettings {
  /** Passages fetched per term. */
  maxPages: number;
  /** Characters kept from each passage before scoring. */
  passageCharLimit: number;
  /** Minimum score for a passage to be kept. */
  relevanceThreshold: number;
  /** Token cap on the resolved context. */
  tokenLimit: number;
}

export const DEFAULT_RESOLVER_SETTINGS: ResolverSettings = {
  maxPages: 2,
  passageCharLimit: 1000,
  relevanceThreshold: 0.2,
  tokenLimit: 200,
};

export interface ContextResolverDeps {
  retriever: PassageRetriever;
  scorer: SimilarityScorer;
  tokens: TokenCounter;
  cache: ContextCache;
  settings?: Partial<ResolverSettings>;
  logger?: Logger;
}

export interface ScoredPassage {
  passage: CandidatePassage;
  text: string;
  score: number;
  kept: boolean;
}

export class ContextResolver {
  readonly settings: ResolverSettings;
  private readonly retriever: PassageRetriever;
  private readonly scorer: SimilarityScorer;
  private readonly tokens: TokenCounter;
  private readonly cache: ContextCache;
  private readonly logger: Logger;

  constructor(deps: ContextResolverDeps) {
    this.retriever = deps.retriever;
    this.scorer = deps.scorer;
    this.tokens = deps.tokens;
    this.cache = deps.cache;
    this.settings = { ...DEFAULT_RESOLVER_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Resolve `term` to at most `tokenLimit` tokens of relevant text.
   * A term with no qualifying passages resolves to (and caches) "".
   */
  async resolve(term: string): Promise<string> {
    const cached = this.cache.get(term);
    if (cached !== undefined) {
      this.logger.debug(`Cache hit for '${term}'`);
      return cached;
    }

    const outcome = await this.retriever.fetch(term, this.settings.maxPages);
    if (outcome.kind === "failed") {
      this.logger.warn(`No passages for '${term}': ${outcome.reason}`);
    }
    const passages = valueOr(outcome, []).slice(0, this.settings.maxPages);

    const kept = this.scorePassages(term, passages)
      .filter((p) => p.kept)
      .map((p) => p.text);
    const context = this.tokens.truncate(kept.join(PASSAGE_SEPARATOR), this.settings.tokenLimit);

    this.cache.put(term, context);
    return context;
  }

  /** Cap, score and mark each passage, preserving fetch order. */
  scorePassages(term: string, passages: readonly CandidatePassage[]): ScoredPassage[] {
    return passages.map((passage) => {
      const text = passage.text.slice(0, this.settings.passageCharLimit);
      const score = this.scorer.score(term, text);
      return { passage, text, score, kept: score >= this.settings.relevanceThreshold };
    });
  }
}
