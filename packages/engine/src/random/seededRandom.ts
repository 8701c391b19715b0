import { InvalidInputError } from '../errors.js';

/**
 * Seeded random source using a 32-bit Linear Congruential Generator.
 *
 * - Multiplier: 1664525 (from Numerical Recipes)
 * - Increment: 1013904223
 * - Modulus: 2^32 (implicit via unsigned 32-bit overflow)
 *
 * Every generator call owns its own instance, so nothing is shared between
 * concurrent renders.
 */
export class SeededRandom {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    // 0 is replaced with 1 to avoid the degenerate case
    this.state = this.seed === 0 ? 1 : this.seed;
  }

  /** Next value in [0, 1). */
  next(): number {
    this.state = (this.state * 1664525 + 1013904223) >>> 0;
    return this.state / 0x100000000;
  }

  /** Uniform value in [min, max). */
  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new InvalidInputError('Cannot choose from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }
}

/**
 * Derive a deterministic sub-seed from a parent seed and a path of salts
 * (e.g. section index, layer index). Same inputs give the same seed no matter
 * which order the children are rendered in.
 */
export function deriveSeed(seed: number, ...salts: number[]): number {
  let h = seed >>> 0;
  for (const salt of salts) {
    h = (Math.imul(h, 1664525) + Math.imul(salt + 1, 1013904223)) >>> 0;
    h = (Math.imul(h ^ (h >>> 16), 22695477) + 1) >>> 0;
  }
  return h;
}

/** A fresh non-deterministic seed, used when the caller supplies none. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}
