/**
 * Pairwise TF-IDF cosine similarity.
 *
 * The vocabulary and document frequencies come from the two input strings
 * only, so a score is meaningful within one call and never across calls.
 */

const WORD_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Lower-case and split into runs of two or more word characters.
 * "Aspirin-based NSAIDs" → ["aspirin", "based", "nsaids"]
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/** Smoothed idf: ln((1 + n) / (1 + df)) + 1. */
function inverseDocumentFrequency(documentCount: number, documentFrequency: number): number {
  return Math.log((1 + documentCount) / (1 + documentFrequency)) + 1;
}

function weightAndNormalize(tf: Map<string, number>, idf: Map<string, number>): Map<string, number> {
  const weighted = new Map<string, number>();
  let sumSquares = 0;
  for (const [term, count] of tf) {
    const weight = count * (idf.get(term) ?? 0);
    weighted.set(term, weight);
    sumSquares += weight * weight;
  }
  const norm = Math.sqrt(sumSquares);
  if (norm > 0) {
    for (const [term, weight] of weighted) {
      weighted.set(term, weight / norm);
    }
  }
  return weighted;
}

/**
 * Cosine similarity of the TF-IDF vectors of `a` and `b`, in [0, 1].
 * Returns 0 when either side has no tokens.
 */
export function tfidfCosine(a: string, b: string): number {
  const tfA = termFrequencies(tokenize(a));
  const tfB = termFrequencies(tokenize(b));
  if (tfA.size === 0 || tfB.size === 0) return 0;

  const idf = new Map<string, number>();
  for (const term of new Set([...tfA.keys(), ...tfB.keys()])) {
    const df = (tfA.has(term) ? 1 : 0) + (tfB.has(term) ? 1 : 0);
    idf.set(term, inverseDocumentFrequency(2, df));
  }

  const vecA = weightAndNormalize(tfA, idf);
  const vecB = weightAndNormalize(tfB, idf);

  let dot = 0;
  for (const [term, weight] of vecA) {
    dot += weight * (vecB.get(term) ?? 0);
  }
  // Floating-point drift can push identical vectors just past 1.
  return Math.min(1, Math.max(0, dot));
}
