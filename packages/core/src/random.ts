/**
 * Injectable randomness. Everything that rolls dice takes a RandomSource so
 * tests can pass a seeded or scripted one.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Deterministic mulberry32 generator. */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new Error('Cannot pick from an empty list');
  const idx = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[idx];
}

/** Hex string built from the random source (not for security). */
export function randomHex(random: RandomSource, length: number): string {
  let out = '';
  while (out.length < length) out += Math.floor(random() * 16).toString(16);
  return out;
}
