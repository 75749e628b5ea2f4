import { choice, probability, range, shuffle, takeRandom } from "./rng";

/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - 32-bit integer operations only
 * - Four state words seeded through SplitMix32
 * - `next()` returns a double in [0, 1)
 * - State can be captured and restored for replays
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * xoshiro128++ state (4 x 32-bit words)
 */
export type RngState = [number, number, number, number];

export class SeededRandom {
  private s: RngState;
  private draws = 0;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next double in [0, 1)
   */
  next(): number {
    this.draws++;
    return this.next32() / 0x100000000;
  }

  /**
   * Number of `next()` draws consumed since construction.
   * Not part of the saved state.
   */
  get consumed(): number {
    return this.draws;
  }

  /**
   * Integer in [min, max], both inclusive
   */
  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  /**
   * Remove and return a random element of `pool`.
   */
  takeRandom<T>(pool: T[]): T | undefined {
    return takeRandom(() => this.next(), pool);
  }

  shuffle<T>(array: readonly T[]): T[] {
    return shuffle(() => this.next(), array);
  }

  probability(chance: number): boolean {
    return probability(() => this.next(), chance);
  }

  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
