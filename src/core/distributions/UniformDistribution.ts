import type { RNG } from '../math/random';
import { NetsynthError, ErrorCode } from '../errors';
import type { SamplingDistribution } from './Distribution';

/**
 * Continuous uniform distribution on [min, max]
 */
export class UniformDistribution implements SamplingDistribution {
  constructor(
    private readonly minValue: number,
    private readonly maxValue: number
  ) {
    if (!Number.isFinite(minValue) || !Number.isFinite(maxValue) || minValue > maxValue) {
      throw new NetsynthError(
        ErrorCode.INVALID_ARGUMENT,
        `Invalid Uniform bounds: min=${minValue}, max=${maxValue}`,
        { min: minValue, max: maxValue }
      );
    }
  }

  /**
   * One uniform draw
   */
  sample(rng: RNG): number {
    return rng.uniformRange(this.minValue, this.maxValue);
  }

  mean(): number {
    return (this.minValue + this.maxValue) / 2;
  }

  variance(): number {
    const width = this.maxValue - this.minValue;
    return (width * width) / 12;
  }

  support(): { min: number; max: number } {
    return { min: this.minValue, max: this.maxValue };
  }
}
