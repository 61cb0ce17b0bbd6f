/**
 * arXiv literature source — abstracts from the Atom query API as passages.
 *
 * The upstream asks clients not to issue parallel requests, so every request
 * made by one client goes through a single ExclusiveLock. Only the HTTP round
 * trip is inside the lock; parsing and everything the caller does with the
 * passages run concurrently.
 */

import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { ExclusiveLock } from "../concurrency/exclusive-lock.js";
import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { empty, failed, success, type Outcome } from "../schemas/outcome.js";
import { RetryingHttpClient, type FetchLike } from "./http-client.js";
import type { CandidatePassage, PassageRetriever } from "./types.js";

const DEFAULT_BASE_URL = "http://export.arxiv.org/api/query";

const AtomLink = z.object({
  "@_href": z.string(),
  "@_rel": z.string().optional(),
  "@_type": z.string().optional(),
});

const AtomEntry = z.object({
  id: z.string(),
  title: z.string().default(""),
  summary: z.string().default(""),
  published: z.string().optional(),
  link: z.array(AtomLink).default([]),
});
type AtomEntry = z.infer<typeof AtomEntry>;

const AtomFeed = z.object({
  feed: z.object({
    entry: z.array(AtomEntry).default([]),
  }),
});

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  isArray: (name) => name === "entry" || name === "link",
});

export interface ArxivClientOptions {
  baseUrl?: string;
  /** Per-request timeout (ms). */
  timeoutMs?: number;
  /** Share one lock between several clients hitting the same upstream. */
  lock?: ExclusiveLock;
  http?: RetryingHttpClient;
  /** Used when `http` is not given. */
  fetchImpl?: FetchLike;
  logger?: Logger;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** `all:"<term>"` — quoted so multi-word terms match as a phrase. */
export function buildSearchQuery(term: string): string {
  return `all:"${term.replace(/"/g, "").trim()}"`;
}

/**
 * Parse an arXiv Atom feed into passages.
 * Throws when the payload is not a feed or is an API error entry.
 */
export function parseArxivFeed(xml: string): CandidatePassage[] {
  const parsed = AtomFeed.safeParse(xmlParser.parse(xml));
  if (!parsed.success) {
    throw new Error("arXiv response did not match the Atom feed schema");
  }

  const entries = parsed.data.feed.entry;
  const apiError = entries.find((entry) => entry.id.includes("/api/errors"));
  if (apiError) {
    throw new Error(`arXiv API error: ${normalizeWhitespace(apiError.summary)}`);
  }

  return entries
    .map(toPassage)
    .filter((passage) => passage.text.length > 0);
}

function toPassage(entry: AtomEntry): CandidatePassage {
  const alternate = entry.link.find((link) => link["@_rel"] === "alternate") ?? entry.link[0];
  return {
    text: normalizeWhitespace(entry.summary),
    source: {
      id: entry.id,
      title: normalizeWhitespace(entry.title),
      url: alternate?.["@_href"],
      published: entry.published,
    },
  };
}

export class ArxivClient implements PassageRetriever {
  readonly id = "arxiv";
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly lock: ExclusiveLock;
  private readonly http: RetryingHttpClient;
  private readonly logger: Logger;

  constructor(options: ArxivClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs;
    this.lock = options.lock ?? new ExclusiveLock();
    this.logger = options.logger ?? silentLogger;
    this.http =
      options.http ??
      new RetryingHttpClient({
        retryAttempts: 0,
        timeoutMs: options.timeoutMs,
        headers: { Accept: "application/atom+xml" },
        fetchImpl: options.fetchImpl,
        logger: this.logger,
      });
  }

  async fetch(term: string, maxItems: number): Promise<Outcome<CandidatePassage[]>> {
    if (maxItems < 1) return empty();

    try {
      const xml = await this.lock.run(() =>
        this.http.getText(this.baseUrl, {
          params: {
            search_query: buildSearchQuery(term),
            start: 0,
            max_results: maxItems,
            sortBy: "relevance",
          },
          timeoutMs: this.timeoutMs,
        }),
      );

      const passages = parseArxivFeed(xml).slice(0, maxItems);
      return passages.length > 0 ? success(passages) : empty();
    } catch (err) {
      const reason = describeError(err);
      this.logger.error(`Error fetching documents for key '${term}'`, { error: reason });
      return failed(reason, err);
    }
  }
}
