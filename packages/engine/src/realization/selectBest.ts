/**
 * Scores closer than this are treated as equal. Weighted terms such as
 * `distance * 0.1` carry rounding error, so two candidates with the same
 * exact score can differ in the last bits.
 */
export const SCORE_TOLERANCE = 1e-9;

/**
 * Stable arg-max: an item replaces the current best only when it scores
 * more than SCORE_TOLERANCE higher, so the first of tied items wins.
 * Returns null for an empty list.
 */
export function selectBest<T>(
  items: Iterable<T>,
  score: (item: T) => number
): { item: T; score: number } | null {
  let best: { item: T; score: number } | null = null;

  for (const item of items) {
    const value = score(item);
    if (best === null || value > best.score + SCORE_TOLERANCE) {
      best = { item, score: value };
    }
  }

  return best;
}
