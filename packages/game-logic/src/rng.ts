/**
 * Every card draw goes through a DrawRng so a match can be replayed
 * from a seed, and tests can script exactly which cards come out.
 */

import { randomInt } from 'node:crypto';

export type Four<T> = [T, T, T, T];

export interface DrawRng {
  /** Picks one item uniformly, or `undefined` when there is nothing to pick. */
  draw<T>(items: readonly T[]): T | undefined;
  /** Picks four distinct items. Throws if fewer than four are given. */
  drawHand<T>(items: readonly T[]): Four<T>;
}

/** mulberry32: each call yields the next float in [0, 1) for the seed. */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Shared draw logic over a source of integers in [0, max).
 * drawHand is a partial Fisher-Yates shuffle over a copy of the input.
 */
abstract class IndexDrawRng implements DrawRng {
  protected abstract nextIndex(max: number): number;

  draw<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.nextIndex(items.length)];
  }

  drawHand<T>(items: readonly T[]): Four<T> {
    if (items.length < 4) {
      throw new RangeError(`Cannot draw a hand of 4 from ${items.length} items`);
    }
    const pool = items.slice();
    for (let i = 0; i < 4; i++) {
      const j = i + this.nextIndex(pool.length - i);
      const tmp = pool[i];
      pool[i] = pool[j];
      pool[j] = tmp;
    }
    return [pool[0], pool[1], pool[2], pool[3]];
  }
}

/** Reproducible draws from a 32-bit seed. */
export class SeededDrawRng extends IndexDrawRng {
  private readonly rng: () => number;

  constructor(readonly seed: number) {
    super();
    this.rng = mulberry32(seed);
  }

  protected nextIndex(max: number): number {
    return Math.floor(this.rng() * max);
  }
}

/** Production draws backed by the operating system's CSPRNG. */
export class CryptoDrawRng extends IndexDrawRng {
  protected nextIndex(max: number): number {
    return randomInt(max);
  }
}
