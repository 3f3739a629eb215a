import type { RNG } from '../math/random';

/**
 * Base interface for the distributions the generator draws from
 */
export interface SamplingDistribution {
  /**
   * Draw one value, consuming a fixed, documented number of draws from `rng`
   */
  sample(rng: RNG): number;

  /**
   * Expected value of the distribution
   */
  mean(): number;

  /**
   * Support of the distribution (closed bounds where attained)
   */
  support(): { min: number; max: number };
}
