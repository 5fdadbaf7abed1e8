const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Split text into lowercase words (letters, digits, underscore).
 */
export function extractWords(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/**
 * Lowercase word set with the given stop words removed
 */
export function wordSet(text: string, stopWords?: ReadonlySet<string>): Set<string> {
  const words = new Set(extractWords(text));
  if (stopWords) {
    for (const word of stopWords) {
      words.delete(word);
    }
  }
  return words;
}

/**
 * Jaccard similarity of two sets (0 when either is empty)
 */
export function jaccardSimilarity<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return intersection / union;
}

/**
 * Cut text to `limit` characters, appending "..." when something was dropped
 */
export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Deterministic 16-hex-digit content hash.
 * Two DJB2 passes with different seeds, concatenated.
 */
export function hashContent(content: string): string {
  let h1 = 5381;
  let h2 = 52711;
  for (let i = 0; i < content.length; i++) {
    const code = content.charCodeAt(i);
    h1 = ((h1 << 5) + h1) ^ code;
    h2 = ((h2 << 5) + h2) ^ code;
  }
  return (h1 >>> 0).toString(16).padStart(8, '0') + (h2 >>> 0).toString(16).padStart(8, '0');
}
