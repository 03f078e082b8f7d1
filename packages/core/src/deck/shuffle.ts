/**
 * Fisher-Yates shuffle algorithm.
 * Returns a new shuffled array; `random` must return values in [0, 1).
 */
export function fisherYatesShuffle<T>(array: T[], random: () => number = Math.random): T[] {
  const result = array.slice();
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
