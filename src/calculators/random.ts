/**
 * Seeded randomness for the stochastic generators.
 *
 * Every generator takes an `Rng` instead of calling Math.random, so a
 * fixed seed reproduces a run exactly.
 */

export type Rng = () => number;

/**
 * mulberry32: small, fast 32-bit PRNG returning floats in [0, 1).
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fresh seed for callers that did not supply one
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}

/**
 * Uniform integer in [0, max)
 */
export function randomInt(rng: Rng, max: number): number {
  return Math.floor(rng() * max);
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(rng, items.length)];
}

/**
 * Draw k distinct items uniformly (partial Fisher-Yates).
 * Returns fewer than k when the input is smaller.
 */
export function sampleDistinct<T>(rng: Rng, items: readonly T[], k: number): T[] {
  const copy = [...items];
  const take = Math.min(k, copy.length);
  for (let i = 0; i < take; i++) {
    const j = i + randomInt(rng, copy.length - i);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, take);
}

export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  return sampleDistinct(rng, items, items.length);
}

/**
 * Draw k distinct items with probability proportional to weight.
 * Non-positive weights are never drawn.
 */
export function weightedSampleDistinct<T>(
  rng: Rng,
  items: readonly T[],
  weight: (item: T) => number,
  k: number
): T[] {
  const remaining = items.map((item) => ({ item, weight: Math.max(0, weight(item)) }));
  const picked: T[] = [];

  while (picked.length < k) {
    const total = remaining.reduce((sum, entry) => sum + entry.weight, 0);
    if (total <= 0) break;

    let target = rng() * total;
    let index = remaining.length - 1;
    for (let i = 0; i < remaining.length; i++) {
      target -= remaining[i].weight;
      if (target < 0) {
        index = i;
        break;
      }
    }
    picked.push(remaining[index].item);
    remaining.splice(index, 1);
  }

  return picked;
}
