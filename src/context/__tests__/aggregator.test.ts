import { describe, it, expect } from "vitest";
import { BudgetedAggregator, SUMMARY_SEPARATOR } from "../aggregator.js";
import type { FoodRecord } from "../../retrieval/fooddata-client.js";
import type { TokenCounter } from "../../tokens/counter.js";
import { RecordingLogger } from "../../testing/recording-logger.js";
import { StubRecordRetriever, type StubRecord, wordCounter } from "../../testing/stubs.js";

function food(description: string): FoodRecord {
  return { description, foodNutrients: [] };
}

function summaryOf(description: string): string {
  return `${description} (Brand: Unknown brand). Key nutrients: none.`;
}

/** Token cost looked up by the summary's first word. */
function costCounter(costs: Record<string, number>): TokenCounter {
  return {
    count: (text) => costs[text.split(" ")[0]] ?? 1,
    truncate: (text) => text,
  };
}

function makeAggregator(
  table: Record<string, StubRecord>,
  options: { tokens?: TokenCounter; budget?: number; workers?: number } = {},
) {
  const retriever = new StubRecordRetriever(table);
  const logger = new RecordingLogger();
  const aggregator = new BudgetedAggregator({
    retriever,
    tokens: options.tokens ?? wordCounter,
    settings: { globalTokenBudget: options.budget ?? 1000, workers: options.workers ?? 5 },
    logger,
  });
  return { aggregator, retriever, logger };
}

describe("BudgetedAggregator", () => {
  it("accepts summaries until the shared budget is spent", async () => {
    const { aggregator, logger } = makeAggregator(
      {
        apple: { record: food("Apple") },
        banana: { record: food("Banana"), delayMs: 20 },
      },
      { tokens: costCounter({ Apple: 6, Banana: 8 }), budget: 10 },
    );

    const result = await aggregator.aggregateDetailed(["apple", "banana"]);

    expect(result.text).toBe(summaryOf("Apple"));
    expect(result.usedTokens).toBe(6);
    expect(result.discarded).toEqual(["banana"]);
    expect(logger.at("warn")).toEqual([
      {
        level: "warn",
        scope: "test",
        message: "Token limit reached. Skipping remaining items.",
        data: { term: "banana", usedTokens: 6, budget: 10 },
      },
    ]);
  });

  it("joins accepted summaries in completion order", async () => {
    const { aggregator } = makeAggregator({
      apple: { record: food("Apple"), delayMs: 30 },
      banana: { record: food("Banana") },
    });

    await expect(aggregator.aggregate(["apple", "banana"])).resolves.toBe(
      `${summaryOf("Banana")}${SUMMARY_SEPARATOR}${summaryOf("Apple")}`,
    );
  });

  it("discards every completion after the budget is exhausted", async () => {
    const { aggregator } = makeAggregator(
      {
        a: { record: food("A") },
        b: { record: food("B"), delayMs: 10 },
        c: { record: food("C"), delayMs: 30 },
      },
      { tokens: costCounter({ A: 6, B: 8, C: 1 }), budget: 10 },
    );

    const result = await aggregator.aggregateDetailed(["a", "b", "c"]);

    expect(result.accepted.map((a) => a.term)).toEqual(["a"]);
    expect(result.discarded).toEqual(["b", "c"]);
    expect(result.usedTokens).toBe(6);
  });

  it("never exceeds the budget", async () => {
    const { aggregator } = makeAggregator(
      {
        a: { record: food("A"), delayMs: 5 },
        b: { record: food("B"), delayMs: 1 },
        c: { record: food("C"), delayMs: 3 },
      },
      { tokens: costCounter({ A: 4, B: 4, C: 4 }), budget: 10 },
    );

    const result = await aggregator.aggregateDetailed(["a", "b", "c"]);

    expect(result.accepted).toHaveLength(2);
    expect(result.usedTokens).toBeLessThanOrEqual(result.budget);
    expect(result.usedTokens).toBe(result.accepted.reduce((sum, a) => sum + a.tokens, 0));
  });

  it("lists terms without a usable record as missing", async () => {
    const { aggregator, logger } = makeAggregator({
      apple: { record: food("Apple") },
      nothing: {},
      blank: { record: { brandOwner: "Acme", foodNutrients: [] } },
    });

    const result = await aggregator.aggregateDetailed(["apple", "nothing", "blank"]);

    expect(result.text).toBe(summaryOf("Apple"));
    expect([...result.missing].sort()).toEqual(["blank", "nothing"]);
    expect(logger.at("error")).toEqual([]);
  });

  it("logs and skips a term whose lookup throws", async () => {
    const { aggregator, logger } = makeAggregator({
      apple: { record: food("Apple") },
      broken: { error: new Error("boom") },
    });

    const result = await aggregator.aggregateDetailed(["broken", "apple"]);

    expect(result.text).toBe(summaryOf("Apple"));
    expect(result.missing).toEqual(["broken"]);
    expect(logger.at("error").map((r) => r.message)).toEqual(["Error processing key 'broken'"]);
  });

  it("runs at most `workers` lookups at once", async () => {
    const table: Record<string, StubRecord> = {};
    const terms = ["a", "b", "c", "d", "e", "f"];
    for (const term of terms) table[term] = { record: food(term), delayMs: 5 };
    const { aggregator, retriever } = makeAggregator(table, { workers: 2 });

    await aggregator.aggregate(terms);

    expect(retriever.calls).toHaveLength(6);
    expect(retriever.maxInFlight).toBe(2);
  });

  it("returns an empty string for no terms", async () => {
    const { aggregator, retriever } = makeAggregator({});

    await expect(aggregator.aggregate([])).resolves.toBe("");
    expect(retriever.calls).toEqual([]);
  });
});
