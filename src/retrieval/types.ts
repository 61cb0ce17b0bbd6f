/**
 * Retrieval source contracts.
 *
 * Sources own network access and parsing. They never throw for I/O
 * problems: failures come back as `failed` outcomes and the caller picks the
 * degraded value.
 */

import type { Outcome } from "../schemas/outcome.js";

/** Record a passage was taken from. */
export interface PassageSource {
  id: string;
  title: string;
  url?: string;
  published?: string;
}

/** Candidate passage before relevance filtering. */
export interface CandidatePassage {
  text: string;
  source: PassageSource;
}

/** Multi-passage document source (literature style). */
export interface PassageRetriever {
  /** Stable source id (e.g. "arxiv"). */
  readonly id: string;
  /** Up to `maxItems` passages for `term`; `empty` when nothing matched. */
  fetch(term: string, maxItems: number): Promise<Outcome<CandidatePassage[]>>;
}

/** Single-record search source (structured-search style). */
export interface RecordRetriever<TRecord> {
  readonly id: string;
  /** Top search hit for `term`; `empty` when there is none. */
  fetch(term: string, timeoutMs?: number): Promise<Outcome<TRecord>>;
}
