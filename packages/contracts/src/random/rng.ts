/**
 * Draw helpers shared by every random source.
 *
 * Each helper takes a `() => number` returning values in [0, 1), so the
 * same draw shapes work over `SeededRandom` or any other source. The number
 * of underlying draws per call is part of the contract: generators rely on
 * it to stay reproducible.
 */

/**
 * Uniform integer in [min, max], both inclusive. Consumes one draw.
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Uniform element of a non-empty array. Consumes one draw, none when the
 * array is empty.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Remove and return a uniform element of `pool`, mutating it.
 *
 * Calling this until the pool is empty visits the elements in a random
 * order without replacement, one draw per call.
 */
export function takeRandom<T>(rng: () => number, pool: T[]): T | undefined {
  if (pool.length === 0) return undefined;
  const index = range(rng, 0, pool.length - 1);
  const [taken] = pool.splice(index, 1);
  return taken;
}

/**
 * Fisher-Yates shuffle into a new array. Consumes `length - 1` draws.
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

/**
 * True with the given probability. Consumes one draw.
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
