/**
 * Budgeted aggregator — structured-search summaries under one shared budget.
 *
 * Acceptance follows completion order, so which terms make it in (and the
 * order of the joined text) can differ between runs when the budget is tight.
 */

import { runPool } from "../concurrency/worker-pool.js";
import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { summarizeFoodRecord, type FoodRecord } from "../retrieval/fooddata-client.js";
import type { RecordRetriever } from "../retrieval/types.js";
import type { TokenCounter } from "../tokens/counter.js";

export const SUMMARY_SEPARATOR = " ";

export interface AggregatorSettings {
  /** Worker pool size. */
  workers: number;
  /** Token cap across all accepted summaries. */
  globalTokenBudget: number;
  /** Per-request timeout (ms); the client default applies when unset. */
  timeoutMs?: number;
}

export const DEFAULT_AGGREGATOR_SETTINGS: AggregatorSettings = {
  workers: 5,
  globalTokenBudget: 128_000,
};

export interface BudgetedAggregatorDeps {
  retriever: RecordRetriever<FoodRecord>;
  tokens: TokenCounter;
  settings?: Partial<AggregatorSettings>;
  /** Record → summary; undefined skips the term. */
  summarize?: (record: FoodRecord) => string | undefined;
  logger?: Logger;
}

export interface AcceptedSummary {
  term: string;
  summary: string;
  tokens: number;
}

export interface AggregationResult {
  text: string;
  /** In acceptance (completion) order. */
  accepted: AcceptedSummary[];
  /** Terms that produced no summary (no record, no description, or failure). */
  missing: string[];
  /** Terms whose summary arrived after the budget was exhausted. */
  discarded: string[];
  usedTokens: number;
  budget: number;
}

export class BudgetedAggregator {
  readonly settings: AggregatorSettings;
  private readonly retriever: RecordRetriever<FoodRecord>;
  private readonly tokens: TokenCounter;
  private readonly summarize: (record: FoodRecord) => string | undefined;
  private readonly logger: Logger;

  constructor(deps: BudgetedAggregatorDeps) {
    this.retriever = deps.retriever;
    this.tokens = deps.tokens;
    this.summarize = deps.summarize ?? summarizeFoodRecord;
    this.settings = { ...DEFAULT_AGGREGATOR_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? silentLogger;
  }

  async aggregate(terms: readonly string[]): Promise<string> {
    return (await this.aggregateDetailed(terms)).text;
  }

  async aggregateDetailed(terms: readonly string[]): Promise<AggregationResult> {
    const budget = this.settings.globalTokenBudget;
    const accepted: AcceptedSummary[] = [];
    const missing: string[] = [];
    const discarded: string[] = [];
    let usedTokens = 0;
    let exhausted = false;

    // Each completion is handled synchronously, so the fit test and the
    // budget update cannot interleave with another completion.
    await runPool(
      terms,
      this.settings.workers,
      (term) => this.fetchSummary(term),
      ({ item: term, result }) => {
        if (result.status === "rejected") {
          this.logger.error(`Error processing key '${term}'`, { error: describeError(result.reason) });
          missing.push(term);
          return;
        }
        const summary = result.value;
        if (summary === undefined) {
          missing.push(term);
          return;
        }
        if (exhausted) {
          discarded.push(term);
          return;
        }

        const tokens = this.tokens.count(summary);
        if (usedTokens + tokens <= budget) {
          accepted.push({ term, summary, tokens });
          usedTokens += tokens;
          return;
        }

        exhausted = true;
        discarded.push(term);
        this.logger.warn("Token limit reached. Skipping remaining items.", {
          term,
          usedTokens,
          budget,
        });
      },
    );

    return {
      text: accepted.map((a) => a.summary).join(SUMMARY_SEPARATOR),
      accepted,
      missing,
      discarded,
      usedTokens,
      budget,
    };
  }

  private async fetchSummary(term: string): Promise<string | undefined> {
    const outcome = await this.retriever.fetch(term, this.settings.timeoutMs);
    if (outcome.kind !== "success") return undefined;
    return this.summarize(outcome.value);
  }
}
