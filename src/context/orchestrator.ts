/**
 * Fans literature resolution out over a worker pool and joins the results
 * in input order.
 */

import { mapPool } from "../concurrency/worker-pool.js";
import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export const BATCH_SEPARATOR = "\n\n---\n\n";

/** Anything that turns one term into one context string. */
export interface TermResolver {
  resolve(term: string): Promise<string>;
}

export interface ContextOrchestratorDeps {
  resolver: TermResolver;
  /** Worker pool size (default 5). */
  workers?: number;
  logger?: Logger;
}

export class ContextOrchestrator {
  readonly workers: number;
  private readonly resolver: TermResolver;
  private readonly logger: Logger;

  constructor(deps: ContextOrchestratorDeps) {
    this.resolver = deps.resolver;
    this.workers = deps.workers ?? 5;
    this.logger = deps.logger ?? silentLogger;
  }

  /** One string per term, same length and order as `terms`. */
  async resolveEach(terms: readonly string[]): Promise<string[]> {
    const settled = await mapPool(terms, this.workers, (term) => this.resolver.resolve(term));
    return settled.map((result, index) => {
      if (result.status === "fulfilled") return result.value;
      this.logger.error(`Error resolving context for '${terms[index]}'`, {
        error: describeError(result.reason),
      });
      return "";
    });
  }

  /** Every slot joined with the batch separator, empty slots included. */
  async resolveAll(terms: readonly string[]): Promise<string> {
    return (await this.resolveEach(terms)).join(BATCH_SEPARATOR);
  }
}
