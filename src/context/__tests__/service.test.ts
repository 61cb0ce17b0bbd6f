import { describe, it, expect } from "vitest";
import { parseConfig } from "../../config/loader.js";
import { ConfigurationError } from "../../errors.js";
import { silentLogger } from "../../logging/logger.js";
import { ContextService, createLiteraturePipeline } from "../service.js";
import { ASPIRIN_FEED } from "../../testing/atom-feed.js";
import { routedFetch } from "../../testing/stubs.js";

const ARXIV = "https://arxiv.test/api/query";
const FOODS = "https://fdc.test/foods/search";

const config = parseConfig({
  literature: { baseUrl: ARXIV },
  foods: { baseUrl: FOODS, apiKeyEnv: "TEST_FOOD_KEY" },
  http: { retryAttempts: 0 },
});

const ASPIRIN_FOOD = {
  foods: [
    {
      description: "Aspirin tablet",
      brandOwner: "Acme",
      foodNutrients: [{ nutrientName: "Energy", value: 0, unitName: "KCAL" }],
    },
  ],
};

describe("ContextService", () => {
  it("fails on a missing API key before any request", () => {
    const fetchImpl = routedFetch({});

    expect(() => ContextService.fromConfig(config, { env: {}, fetchImpl, logger: silentLogger })).toThrow(
      ConfigurationError,
    );
    expect(fetchImpl.urls).toEqual([]);
  });

  it("puts food summaries before the literature context", async () => {
    const fetchImpl = routedFetch({
      [ARXIV]: () => new Response(ASPIRIN_FEED),
      [FOODS]: () => new Response(JSON.stringify(ASPIRIN_FOOD)),
    });
    const service = ContextService.fromConfig(config, {
      env: { TEST_FOOD_KEY: "test-key" },
      fetchImpl,
      logger: silentLogger,
    });

    await expect(service.buildContext(["aspirin"])).resolves.toBe(
      "Aspirin tablet (Brand: Acme). Key nutrients: Energy: 0 KCAL.\n\nAspirin inhibits platelet aggregation.",
    );
  });

  it("still returns literature when the food source is down", async () => {
    const fetchImpl = routedFetch({
      [ARXIV]: () => new Response(ASPIRIN_FEED),
      [FOODS]: () => new Response("unavailable", { status: 503 }),
    });
    const service = ContextService.fromConfig(config, {
      env: { TEST_FOOD_KEY: "test-key" },
      fetchImpl,
      logger: silentLogger,
    });

    await expect(service.buildContext(["aspirin"])).resolves.toBe("\n\nAspirin inhibits platelet aggregation.");
  });
});

describe("createLiteraturePipeline", () => {
  it("caches resolved contexts across batches", async () => {
    const fetchImpl = routedFetch({ [ARXIV]: () => new Response(ASPIRIN_FEED) });
    const pipeline = createLiteraturePipeline(config, { fetchImpl, logger: silentLogger });

    const first = await pipeline.orchestrator.resolveAll(["aspirin"]);
    const second = await pipeline.orchestrator.resolveAll(["aspirin"]);

    expect(second).toBe(first);
    expect(fetchImpl.urls).toHaveLength(1);
    expect(pipeline.cache.size).toBe(1);
  });
});
