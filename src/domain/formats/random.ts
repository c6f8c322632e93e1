/** Source of uniform floats in [0, 1). */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Deterministic xorshift32 generator for reproducible output in tests.
 * A zero seed would stay at zero forever, so it is replaced.
 */
export function createSeededRng(seed: number): Rng {
  let s = seed | 0 || 0x2545f491;
  return () => {
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    return (s >>> 0) / 4294967296;
  };
}

/** Integer in [min, maxExclusive). */
export function randomInt(rng: Rng, min: number, maxExclusive: number): number {
  return min + Math.floor(rng() * (maxExclusive - min));
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  const item = items[randomInt(rng, 0, items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return item;
}
