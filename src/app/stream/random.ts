/**
 * Random sources for mode selection. Inject a seeded source to make
 * selection reproducible.
 */

export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

function hashSeed(seed: string | number): number {
  const text = String(seed);
  let hash = 0;
  for (let index = 0; index < text.length; index += 1) {
    hash = Math.imul(31, hash) + text.charCodeAt(index);
    hash |= 0;
  }
  return hash >>> 0;
}

/**
 * Deterministic generator in [0, 1) derived from a seed.
 */
export function createSeededRandom(seed: string | number): RandomSource {
  let state = hashSeed(seed) || 0x9e3779b9;

  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Scripted source for tests and replays; repeats the last value when exhausted.
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return () => {
    if (values.length === 0) {
      return 0;
    }
    const value = values[Math.min(index, values.length - 1)];
    index += 1;
    return value;
  };
}
