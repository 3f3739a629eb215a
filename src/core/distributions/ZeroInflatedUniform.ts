/**
 * Two-component mixture: a point mass at zero and a uniform band.
 *
 * Models packet loss: with probability `cleanProbability` a sample is exactly 0
 * (clean regime); otherwise it is uniform on [min, max] (congested regime).
 *
 * Draw contract: one branch draw per sample, plus one uniform draw only on the
 * congested branch.
 */

import type { RNG } from '../math/random';
import { NetsynthError, ErrorCode } from '../errors';
import type { SamplingDistribution } from './Distribution';
import { UniformDistribution } from './UniformDistribution';

export class ZeroInflatedUniform implements SamplingDistribution {
  private readonly band: UniformDistribution;

  constructor(
    private readonly cleanProbability: number,
    private readonly minValue: number,
    private readonly maxValue: number
  ) {
    if (!(cleanProbability >= 0 && cleanProbability <= 1)) {
      throw new NetsynthError(
        ErrorCode.INVALID_ARGUMENT,
        'Clean probability must be in [0, 1]',
        { cleanProbability }
      );
    }
    if (!(minValue > 0)) {
      throw new NetsynthError(
        ErrorCode.INVALID_ARGUMENT,
        'Congested band must be strictly positive',
        { min: minValue, max: maxValue }
      );
    }
    this.band = new UniformDistribution(minValue, maxValue);
  }

  sample(rng: RNG): number {
    if (rng.bernoulli(this.cleanProbability)) {
      return 0;
    }
    return this.band.sample(rng);
  }

  /**
   * (1 - p) · (min + max) / 2
   */
  mean(): number {
    return (1 - this.cleanProbability) * this.band.mean();
  }

  support(): { min: number; max: number } {
    return { min: 0, max: this.maxValue };
  }

  /**
   * Probability that a sample is exactly zero
   */
  zeroProbability(): number {
    return this.cleanProbability;
  }
}
