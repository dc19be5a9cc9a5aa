/**
 * String similarity for team and participant names.
 */

// ============ Text Normalization ============

/**
 * Lowercase, drop punctuation, collapse whitespace.
 *
 * @example
 * normalizeName("St. Louis  Blues") // "st louis blues"
 */
export function normalizeName(text: string): string {
  return text
    .toLowerCase()
    .replace(/\./g, "")
    .replace(/[^\w\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeName(text);
  return normalized.length === 0 ? [] : normalized.split(" ");
}

// ============ String Distance ============

/**
 * Levenshtein (edit) distance using a single rolling row.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  let prevRow: number[] = Array.from({ length: a.length + 1 }, (_, i) => i);
  let currRow: number[] = new Array<number>(a.length + 1).fill(0);

  for (let j = 1; j <= b.length; j++) {
    currRow[0] = j;
    for (let i = 1; i <= a.length; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        prevRow[i] + 1, // deletion
        currRow[i - 1] + 1, // insertion
        prevRow[i - 1] + cost // substitution
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[a.length];
}

/**
 * Normalized Levenshtein similarity (1 = identical).
 */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const maxLen = Math.max(a.length, b.length);
  return 1 - levenshteinDistance(a, b) / maxLen;
}

// ============ Set-Based Similarity ============

/**
 * Jaccard = |A ∩ B| / |A ∪ B|
 */
export function jaccardSimilarity<T>(setA: Set<T>, setB: Set<T>): number {
  if (setA.size === 0 && setB.size === 0) return 1;
  if (setA.size === 0 || setB.size === 0) return 0;

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }

  return intersection / (setA.size + setB.size - intersection);
}

export function tokenOverlapSimilarity(a: string, b: string): number {
  return jaccardSimilarity(new Set(tokenize(a)), new Set(tokenize(b)));
}

/**
 * Best of edit-distance and token-overlap similarity on normalized text.
 */
export function textSimilarity(a: string, b: string): number {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  return Math.max(levenshteinSimilarity(na, nb), tokenOverlapSimilarity(na, nb));
}
