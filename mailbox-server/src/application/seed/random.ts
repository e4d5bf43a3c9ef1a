/**
 * Source of uniformly distributed numbers in [0, 1), like Math.random.
 */
export type Random = () => number;

/**
 * Integer in [min, max], both inclusive.
 */
export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pickOne<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.floor(random() * items.length)];
}

/**
 * Pick an item with probability proportional to its weight.
 */
export function pickWeighted<T>(random: Random, entries: ReadonlyArray<readonly [T, number]>): T {
  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  let roll = random() * total;
  for (const [item, weight] of entries) {
    if (roll < weight) return item;
    roll -= weight;
  }
  return pickOne(random, entries.map(([item]) => item));
}
