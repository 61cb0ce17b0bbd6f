/**
 * USDA FoodData Central search — the top hit for a term as one record.
 */

import { z } from "zod";
import { ConfigurationError, describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { empty, failed, success, type Outcome } from "../schemas/outcome.js";
import { RetryingHttpClient, type RetryingHttpClientOptions } from "./http-client.js";
import type { RecordRetriever } from "./types.js";

const DEFAULT_BASE_URL = "https://api.nal.usda.gov/fdc/v1/foods/search";

/** Brand shown when the record has no brand owner. */
export const UNKNOWN_BRAND = "Unknown brand";

/** Nutrients listed in a summary. */
export const SUMMARY_NUTRIENT_COUNT = 3;

const FoodNutrient = z.object({
  nutrientName: z.string(),
  value: z.number().optional(),
  unitName: z.string().optional(),
});

export const FoodRecord = z.object({
  fdcId: z.number().optional(),
  description: z.string().optional(),
  brandOwner: z.string().optional(),
  foodNutrients: z.array(FoodNutrient).default([]),
});
export type FoodRecord = z.infer<typeof FoodRecord>;

const FoodSearchResponse = z.object({
  foods: z.array(FoodRecord).default([]),
});

/**
 * One-line summary of a record, or undefined when it has no description.
 * "Apple, raw (Brand: Unknown brand). Key nutrients: Protein: 0.3 G, Energy: 52 KCAL."
 */
export function summarizeFoodRecord(record: FoodRecord): string | undefined {
  const description = record.description?.trim();
  if (!description) return undefined;

  const brand = record.brandOwner?.trim() || UNKNOWN_BRAND;
  const nutrients = record.foodNutrients
    .slice(0, SUMMARY_NUTRIENT_COUNT)
    .map((n) => [`${n.nutrientName}:`, n.value, n.unitName].filter((part) => part !== undefined).join(" "))
    .join(", ");

  return `${description} (Brand: ${brand}). Key nutrients: ${nutrients || "none"}.`;
}

export interface FoodDataClientOptions
  extends Pick<RetryingHttpClientOptions, "retryAttempts" | "backoffFactor" | "fetchImpl" | "sleep"> {
  /** Required; construction fails without it. */
  apiKey: string | undefined;
  baseUrl?: string;
  /** Default per-request timeout (ms). */
  timeoutMs?: number;
  logger?: Logger;
}

export class FoodDataClient implements RecordRetriever<FoodRecord> {
  readonly id = "fooddata";
  private readonly baseUrl: string;
  private readonly http: RetryingHttpClient;
  private readonly logger: Logger;

  constructor(options: FoodDataClientOptions) {
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new ConfigurationError(
        "CONFIG_MISSING_CREDENTIAL",
        "API key not found. FoodData Central requires an API key.",
      );
    }

    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.logger = options.logger ?? silentLogger;
    this.http = new RetryingHttpClient({
      retryAttempts: options.retryAttempts,
      backoffFactor: options.backoffFactor,
      timeoutMs: options.timeoutMs,
      // api.data.gov accepts the key as a header, keeping it out of URLs.
      headers: { "X-Api-Key": apiKey },
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
      logger: this.logger,
    });
  }

  async fetch(term: string, timeoutMs?: number): Promise<Outcome<FoodRecord>> {
    try {
      const raw = await this.http.getJson(this.baseUrl, {
        params: { query: term, pageSize: 1 },
        timeoutMs,
      });

      const parsed = FoodSearchResponse.safeParse(raw ?? {});
      if (!parsed.success) {
        throw new Error("FoodData Central response did not match expected schema");
      }

      const top = parsed.data.foods[0];
      return top ? success(top) : empty();
    } catch (err) {
      const reason = describeError(err);
      this.logger.error(`Error fetching data for key '${term}'`, { error: reason });
      return failed(reason, err);
    }
  }
}
