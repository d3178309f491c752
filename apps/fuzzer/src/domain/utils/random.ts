import { unsafeUniformIntDistribution, xoroshiro128plus } from "pure-rand";
import type { RandomGenerator } from "pure-rand";

const FLOAT_RANGE = 2 ** 31;

/**
 * Draw a seed from the clock and Math.random when none is configured.
 * The value is reported with the run so it can be replayed.
 */
export function drawSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * FLOAT_RANGE)) | 0;
}

/**
 * Seeded random source (xoroshiro128+).
 * Draws advance the wrapped generator; clone() before drawing to keep the
 * original state untouched.
 */
export class Random {
  private readonly rng: RandomGenerator;

  constructor(rng: RandomGenerator) {
    this.rng = rng;
  }

  static fromSeed(seed: number): Random {
    return new Random(xoroshiro128plus(seed));
  }

  clone(): Random {
    return new Random(this.rng.clone());
  }

  /** Snapshot of the underlying generator */
  generator(): RandomGenerator {
    return this.rng.clone();
  }

  /** Integer in [min, max] */
  int(min: number, max: number): number {
    return unsafeUniformIntDistribution(min, max, this.rng);
  }

  /** Float in [0, 1) */
  float(): number {
    return unsafeUniformIntDistribution(0, FLOAT_RANGE - 1, this.rng) / FLOAT_RANGE;
  }

  /** Float in [min, max) */
  uniform(min: number, max: number): number {
    return min + this.float() * (max - min);
  }

  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.float() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error("cannot pick from an empty list");
    }
    const item = items[this.int(0, items.length - 1)];
    if (item === undefined) {
      throw new Error("pick index out of range");
    }
    return item;
  }

  /** Weighted choice; items with weight ≤ 0 are never drawn */
  weighted<T>(items: readonly T[], weightOf: (item: T) => number): T {
    const total = items.reduce((sum, item) => sum + Math.max(0, weightOf(item)), 0);
    if (total <= 0) {
      throw new Error("weighted choice needs a positive total weight");
    }

    let threshold = this.float() * total;
    for (const item of items) {
      const weight = Math.max(0, weightOf(item));
      if (weight > 0 && threshold < weight) return item;
      threshold -= weight;
    }

    // Floating-point remainder lands on the last drawable item
    return this.pick(items.filter((item) => weightOf(item) > 0).slice(-1));
  }
}
