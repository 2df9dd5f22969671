import type { ProbabilityTable, TableKey } from "./probabilityTable";

/**
 * Draws one outcome: walks the table in iteration order and returns the
 * first outcome whose cumulative probability reaches a uniform draw in [0,1).
 */
export function sample<K extends TableKey>(
  distribution: ProbabilityTable<K>,
  random: () => number = Math.random,
): K {
  const draw = random();
  const entries = distribution.entries();

  let cumulative = 0;
  for (const [outcome, probability] of entries) {
    cumulative += probability;
    if (cumulative >= draw) return outcome;
  }
  // Rounding can leave the cumulative sum just under the draw.
  return entries[entries.length - 1][0];
}
