/**
 * Name Suggestion
 * Fuzzy matching for "did you mean" hints on unknown names
 */

/**
 * Find similar names using fuzzy matching.
 *
 * Constraints:
 * - Edit distance threshold: <= 2
 * - Max suggestions: 3
 * - Sort: ascending by distance, then alphabetically
 */
export function suggestSimilarNames(
  target: string,
  candidates: readonly string[]
): string[] {
  if (target === '' || candidates.length === 0) {
    return [];
  }

  const candidatesWithDistance = candidates
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2);

  candidatesWithDistance.sort((a, b) => {
    if (a.distance !== b.distance) {
      return a.distance - b.distance;
    }
    return a.name.localeCompare(b.name);
  });

  return candidatesWithDistance.slice(0, 3).map((item) => item.name);
}

/** Append ", did you mean ...?" when there is a close match */
export function withSuggestion(
  message: string,
  target: string,
  candidates: readonly string[]
): string {
  const similar = suggestSimilarNames(target, candidates);
  if (similar.length === 0) return message;
  return `${message}; did you mean ${similar.map((n) => `'${n}'`).join(' or ')}?`;
}

/**
 * Levenshtein distance with a rolling row: O(m*n) time, O(min(m,n)) space.
 */
function levenshteinDistance(a: string, b: string): number {
  // Ensure a is the shorter string for space optimization
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;

  if (m === 0) return n;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;

    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1, // deletion
        (currRow[i - 1] ?? 0) + 1, // insertion
        (prevRow[i - 1] ?? 0) + cost // substitution
      );
    }

    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}
