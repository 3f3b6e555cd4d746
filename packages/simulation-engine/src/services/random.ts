import type { RandomSource } from "../types.js";

export const mathRandom: RandomSource = { next: () => Math.random() };

/**
 * Deterministic source (mulberry32). Used where a test needs to force or
 * replay random outcomes.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Uniform float in [min, max). */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

export function pickRandom<T>(rng: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(rng.next() * items.length)];
  if (item === undefined) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return item;
}

/** Round to two decimals, the precision of every amount on the wire. */
export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
