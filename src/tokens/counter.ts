/**
 * Token counting and truncation against the cl100k_base encoding.
 *
 * Both operations are synchronous and keep no per-call state on the instance,
 * so a single counter can serve every concurrent task.
 */

import { getEncoding } from "js-tiktoken";
import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

/** Characters kept when tokenization itself fails. */
export const FALLBACK_CHAR_LIMIT = 1000;

const REPLACEMENT_CHAR = "�";

export interface TokenCounter {
  count(text: string): number;
  /** Result always counts ≤ `limit` tokens. */
  truncate(text: string, limit: number): string;
}

/** Minimal encode/decode surface of a BPE encoding. */
export interface TokenEncoding {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

/**
 * Estimate token count using a 4-chars-per-token heuristic.
 * Used only when the real encoder fails.
 */
export function estimateTokens(text: string): number {
  if (text.length === 0) return 0;
  return Math.ceil(text.length / 4);
}

export interface TiktokenCounterOptions {
  /** Encoding to use; defaults to cl100k_base, loaded on first use. */
  encoding?: TokenEncoding;
  logger?: Logger;
}

export class TiktokenCounter implements TokenCounter {
  private encoding?: TokenEncoding;
  private readonly logger: Logger;

  constructor(options: TiktokenCounterOptions = {}) {
    this.encoding = options.encoding;
    this.logger = options.logger ?? silentLogger;
  }

  count(text: string): number {
    try {
      return this.getEncoding().encode(text).length;
    } catch (err) {
      this.logger.error("Error counting tokens", { error: describeError(err) });
      return estimateTokens(text);
    }
  }

  truncate(text: string, limit: number): string {
    try {
      const encoding = this.getEncoding();
      const tokens = encoding.encode(text);
      if (tokens.length <= limit) {
        return text;
      }
      return this.decodePrefix(encoding, tokens, Math.max(0, limit));
    } catch (err) {
      this.logger.error("Error truncating text", { error: describeError(err) });
      return text.slice(0, FALLBACK_CHAR_LIMIT);
    }
  }

  /**
   * Decode the first `limit` tokens. A cut inside a multi-byte character
   * decodes to U+FFFD; drop those and shrink until the re-encoded prefix fits.
   */
  private decodePrefix(encoding: TokenEncoding, tokens: number[], limit: number): string {
    for (let end = limit; end > 0; end--) {
      let decoded = encoding.decode(tokens.slice(0, end));
      while (decoded.endsWith(REPLACEMENT_CHAR)) {
        decoded = decoded.slice(0, -1);
      }
      if (encoding.encode(decoded).length <= limit) {
        return decoded;
      }
    }
    return "";
  }

  private getEncoding(): TokenEncoding {
    if (!this.encoding) {
      this.encoding = getEncoding("cl100k_base");
    }
    return this.encoding;
  }
}
