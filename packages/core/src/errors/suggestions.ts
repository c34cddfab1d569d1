/**
 * Suggestion helpers
 * Pure functions used to enrich error context with "did you mean" hints.
 */

/**
 * Levenshtein distance over UTF-16 code units (single-row DP).
 */
export function calculateDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + substitution
        )
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Return up to 3 close matches for a misspelt name, closest first.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 2
): string[] {
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(input, option),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance || a.option.localeCompare(b.option))
    .slice(0, 3)
    .map(({ option }) => option);
}

/**
 * Suggestion text for an unknown name: the close matches when there are
 * any, otherwise the full list.
 */
export function suggestName(
  input: string,
  validOptions: readonly string[],
  noun: string
): string | undefined {
  if (validOptions.length === 0) return undefined;
  const close = didYouMean(input, validOptions);
  if (close.length > 0) {
    return `Did you mean ${close.map((name) => `"${name}"`).join(' or ')}?`;
  }
  return `Known ${noun}: ${validOptions.join(', ')}`;
}
