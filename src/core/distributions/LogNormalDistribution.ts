/**
 * LogNormal distribution
 *
 * If X ~ LogNormal(μ, σ), then log(X) ~ Normal(μ, σ).
 * Parameterization: location (μ) and scale (σ) of the underlying normal
 * - Mean: exp(μ + σ²/2)
 * - Variance: (exp(σ²) - 1) * exp(2μ + σ²)
 * - Median: exp(μ)
 * - Mode: exp(μ - σ²)
 *
 * Latency values in netsynth (RTT, server delay) are drawn from this.
 */

import jStat from 'jstat';
import type { RNG } from '../math/random';
import { NetsynthError, ErrorCode } from '../errors';
import type { SamplingDistribution } from './Distribution';

export class LogNormalDistribution implements SamplingDistribution {
  constructor(
    private readonly muValue: number,
    private readonly sigmaValue: number
  ) {
    if (!Number.isFinite(muValue) || !Number.isFinite(sigmaValue) || sigmaValue < 0) {
      throw new NetsynthError(
        ErrorCode.INVALID_ARGUMENT,
        `Invalid LogNormal parameters: mu=${muValue}, sigma=${sigmaValue}`,
        { mu: muValue, sigma: sigmaValue }
      );
    }
  }

  /**
   * LogNormal whose median is `median`, i.e. μ = ln(median)
   */
  static fromMedian(median: number, sigma: number): LogNormalDistribution {
    if (!(median > 0)) {
      throw new NetsynthError(ErrorCode.INVALID_ARGUMENT, 'LogNormal median must be positive', {
        median,
      });
    }
    return new LogNormalDistribution(Math.log(median), sigma);
  }

  /**
   * exp(μ + σ·z) for one standard normal draw z
   */
  sample(rng: RNG): number {
    return Math.exp(this.muValue + this.sigmaValue * rng.normal());
  }

  pdf(x: number): number {
    if (x <= 0) return 0;

    if (this.sigmaValue === 0) {
      // Point mass at exp(μ)
      return x === Math.exp(this.muValue) ? Infinity : 0;
    }

    return jStat.lognormal.pdf(x, this.muValue, this.sigmaValue);
  }

  /**
   * Φ((log(x) - μ) / σ)
   */
  cdf(x: number): number {
    if (x <= 0) return 0;

    if (this.sigmaValue === 0) {
      return x >= Math.exp(this.muValue) ? 1 : 0;
    }

    return jStat.lognormal.cdf(x, this.muValue, this.sigmaValue);
  }

  quantile(p: number): number {
    if (p <= 0) return 0;
    if (p >= 1) return Infinity;
    if (this.sigmaValue === 0) return Math.exp(this.muValue);

    return jStat.lognormal.inv(p, this.muValue, this.sigmaValue);
  }

  mean(): number {
    return Math.exp(this.muValue + (this.sigmaValue * this.sigmaValue) / 2);
  }

  variance(): number {
    const sigma2 = this.sigmaValue * this.sigmaValue;
    return (Math.exp(sigma2) - 1) * Math.exp(2 * this.muValue + sigma2);
  }

  stdDev(): number {
    return Math.sqrt(this.variance());
  }

  median(): number {
    return Math.exp(this.muValue);
  }

  mode(): number {
    return Math.exp(this.muValue - this.sigmaValue * this.sigmaValue);
  }

  support(): { min: number; max: number } {
    return { min: 0, max: Infinity };
  }

  mu(): number {
    return this.muValue;
  }

  sigma(): number {
    return this.sigmaValue;
  }

  getParameters(): { mu: number; sigma: number } {
    return { mu: this.muValue, sigma: this.sigmaValue };
  }
}
