/**
 * Random helpers
 *
 * Gameplay draws from an injectable uniform source so tests can script
 * spawns and background-track choices.
 */

/** Uniform source in [0, 1) */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Uniform integer in [min, max], both ends inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Uniform pick from a non-empty list
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

/**
 * Replays a fixed list of values, then keeps returning the fallback
 */
export function sequenceRandom(values: readonly number[], fallback: number): RandomSource {
  let index = 0;
  return () => (index < values.length ? values[index++] : fallback);
}
