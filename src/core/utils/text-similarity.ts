/**
 * Text matching utilities shared by scoring, advisors and the gate.
 */

/** Exact or substring label match */
export const LABEL_MATCH_SCORE = 0.95;

/**
 * Tokenize text into a set of lowercase word tokens.
 */
export function tokenize(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((word) => word.length > 0);

  return new Set(words);
}

/**
 * Jaccard index |A ∩ B| / |A ∪ B|. Zero when either set is empty.
 */
export function jaccardSimilarity(setA: ReadonlySet<string>, setB: ReadonlySet<string>): number {
  if (setA.size === 0 || setB.size === 0) {
    return 0;
  }

  let intersectionSize = 0;
  const smaller = setA.size <= setB.size ? setA : setB;
  const larger = setA.size <= setB.size ? setB : setA;

  for (const word of smaller) {
    if (larger.has(word)) {
      intersectionSize++;
    }
  }

  return intersectionSize / (setA.size + setB.size - intersectionSize);
}

/**
 * Best similarity between any label on the left and any on the right.
 *
 * Exact or substring containment in either direction scores 0.95,
 * otherwise the best token Jaccard.
 */
export function labelSimilarity(left: readonly string[], right: readonly string[]): number {
  let best = 0;
  for (const rawA of left) {
    const a = rawA.trim().toLowerCase();
    if (!a) continue;
    for (const rawB of right) {
      const b = rawB.trim().toLowerCase();
      if (!b) continue;
      if (a === b || a.includes(b) || b.includes(a)) {
        return LABEL_MATCH_SCORE;
      }
      best = Math.max(best, jaccardSimilarity(tokenize(a), tokenize(b)));
    }
  }
  return best;
}

/**
 * Distinct lowercase words of at least four characters (apostrophes kept).
 */
export function extractKeywords(text: string): string[] {
  const matches = text.toLowerCase().match(/[\p{L}\p{N}_']{4,}/gu) ?? [];
  return [...new Set(matches)];
}

/**
 * Normalize text to space-separated lowercase words with a leading and
 * trailing space, so markers can be matched on word boundaries.
 */
function padWords(text: string): string {
  const words = text.toLowerCase().match(/[\p{L}\p{N}_']+/gu) ?? [];
  return ` ${words.join(' ')} `;
}

/**
 * Markers (single words or phrases) that occur in text as whole words.
 */
export function findMarkers(text: string, markers: readonly string[]): string[] {
  const padded = padWords(text);
  return markers.filter((marker) => {
    const normalized = padWords(marker);
    return normalized.trim().length > 0 && padded.includes(normalized);
  });
}

/**
 * True when any marker occurs in text as whole words.
 */
export function containsAny(text: string, markers: readonly string[]): boolean {
  return findMarkers(text, markers).length > 0;
}

/**
 * Total number of whole-word occurrences of the markers in text.
 */
export function countOccurrences(text: string, markers: readonly string[]): number {
  const padded = padWords(text);
  let count = 0;
  for (const marker of markers) {
    const needle = padWords(marker);
    if (needle.trim().length === 0) continue;
    let from = padded.indexOf(needle);
    while (from !== -1) {
      count++;
      // step past the word but keep the shared separator for the next match
      from = padded.indexOf(needle, from + needle.length - 1);
    }
  }
  return count;
}
