import seedrandom from 'seedrandom';

/**
 * Uniform float in [0, 1). Injected wherever canned text or samples are picked.
 */
export type RandomSource = () => number;

/**
 * seedrandom PRNG; reproducible when a seed is given, auto-seeded otherwise.
 */
export function createRandomSource(seed?: string): RandomSource {
  const rng = seed !== undefined ? seedrandom(seed) : seedrandom();
  return () => rng();
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

/**
 * Up to `count` distinct elements, drawn without replacement, in draw order.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  const picked: T[] = [];
  const target = Math.min(count, pool.length);

  while (picked.length < target && pool.length > 0) {
    const index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
    const [item] = pool.splice(index, 1);
    if (item !== undefined) picked.push(item);
  }
  return picked;
}
