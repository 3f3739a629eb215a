// src/core/math/random.ts
/**
 * Seeded random streams for sample generation
 *
 * One RNG is one Mersenne Twister stream. Generators create their own RNG per
 * call and thread it through every draw; there is no process-wide stream.
 */

import { Random, MersenneTwister19937 } from 'random-js';
import { NetsynthError, ErrorCode } from '../errors';

const TWO_POW_32 = 2 ** 32;

/**
 * Check that a seed can initialize a stream: a non-negative safe integer
 */
export function assertValidSeed(seed: number): void {
  if (!Number.isSafeInteger(seed) || seed < 0) {
    throw new NetsynthError(
      ErrorCode.INVALID_ARGUMENT,
      'Seed must be a non-negative safe integer',
      { seed }
    );
  }
}

/**
 * Split a seed into 32-bit words (low word first) for seedWithArray
 */
export function seedWords(seed: number): [number, number] {
  assertValidSeed(seed);
  return [seed % TWO_POW_32, Math.floor(seed / TWO_POW_32)];
}

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private readonly random: Random;
  private normalCache: number | null = null;

  /**
   * @param seed - Non-negative safe integer
   * @param rowIndex - When given, selects the sub-stream for that row
   */
  constructor(seed: number, rowIndex?: number) {
    const words: number[] = seedWords(seed);
    if (rowIndex !== undefined) {
      if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= TWO_POW_32) {
        throw new NetsynthError(
          ErrorCode.INVALID_ARGUMENT,
          'Row index must be a 32-bit unsigned integer',
          { rowIndex }
        );
      }
      words.push(rowIndex);
    }
    this.random = new Random(MersenneTwister19937.seedWithArray(words));
  }

  /**
   * Independent stream for one row, derived from (seed, rowIndex).
   * Rows generated this way do not depend on evaluation order.
   */
  static forRow(seed: number, rowIndex: number): RNG {
    return new RNG(seed, rowIndex);
  }

  /**
   * Uniform random in [0, 1). Consumes two engine outputs (53 bits).
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * Uniform random in [min, max). One uniform draw.
   */
  uniformRange(min: number, max: number): number {
    return min + (max - min) * this.uniform();
  }

  /**
   * True with probability p. One uniform draw.
   */
  bernoulli(p: number): boolean {
    return this.uniform() < p;
  }

  /**
   * Standard normal using the Box-Muller transform.
   *
   * Each pair draws u1 then u2; the first call returns r·cos(θ) and caches
   * r·sin(θ) for the second. u1 is taken from (0, 1] so log(u1) is finite.
   */
  normal(): number {
    if (this.normalCache !== null) {
      const value = this.normalCache;
      this.normalCache = null;
      return value;
    }

    const u1 = 1 - this.uniform();
    const u2 = this.uniform();

    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.normalCache = r * Math.sin(theta);

    return r * Math.cos(theta);
  }

  /**
   * Normal distribution with mean and standard deviation
   */
  normalDistribution(mean: number, stdDev: number): number {
    return mean + stdDev * this.normal();
  }
}
