/**
 * Model constants for the synthetic network model.
 *
 * These are the model's physics: latency distributions, the loss mixture and
 * the throughput cost weights. All of them can be overridden per generator so
 * sensitivity experiments never touch the generation logic.
 */

import { NetsynthError, ErrorCode } from '../core/errors';

export interface LogNormalParameters {
  /** Mean of the underlying normal (log-milliseconds) */
  mu: number;

  /** Standard deviation of the underlying normal */
  sigma: number;
}

export interface LossParameters {
  /** Probability of the clean regime (loss exactly 0) */
  cleanProbability: number;

  /** Lower bound of the congested regime's uniform band */
  min: number;

  /** Upper bound of the congested regime's uniform band */
  max: number;
}

export interface ThroughputParameters {
  /** Numerator of base throughput: scale / total cost (Mbps·ms) */
  scale: number;

  /**
   * Milliseconds of cost per unit of loss fraction.
   * Large on purpose: small loss fractions dominate the cost.
   */
  lossWeight: number;

  /** Lower bound of the multiplicative measurement noise */
  noiseMin: number;

  /** Upper bound of the multiplicative measurement noise */
  noiseMax: number;

  /** Minimum reported throughput (Mbps) */
  floor: number;
}

export interface ModelParameters {
  rtt: LogNormalParameters;
  serverDelay: LogNormalParameters;
  loss: LossParameters;
  throughput: ThroughputParameters;
}

export type ModelParameterOverrides = {
  [K in keyof ModelParameters]?: Partial<ModelParameters[K]>;
};

export const DEFAULT_MODEL_PARAMETERS: Readonly<ModelParameters> = deepFreeze({
  // Median RTT 30 ms
  rtt: { mu: Math.log(30), sigma: 0.5 },
  // Median server delay 20 ms, wider spread for variable load
  serverDelay: { mu: Math.log(20), sigma: 0.8 },
  loss: { cleanProbability: 0.85, min: 0.001, max: 0.02 },
  throughput: { scale: 10000, lossWeight: 5000, noiseMin: 0.9, noiseMax: 1.1, floor: 0.01 },
});

/**
 * Merge overrides onto the defaults, validate, and freeze the result
 */
export function resolveModelParameters(
  overrides: ModelParameterOverrides = {}
): Readonly<ModelParameters> {
  const merged: ModelParameters = {
    rtt: { ...DEFAULT_MODEL_PARAMETERS.rtt, ...overrides.rtt },
    serverDelay: { ...DEFAULT_MODEL_PARAMETERS.serverDelay, ...overrides.serverDelay },
    loss: { ...DEFAULT_MODEL_PARAMETERS.loss, ...overrides.loss },
    throughput: { ...DEFAULT_MODEL_PARAMETERS.throughput, ...overrides.throughput },
  };

  validateModelParameters(merged);
  return deepFreeze(merged);
}

/**
 * Throws INVALID_CONFIG naming the first offending parameter path
 */
export function validateModelParameters(params: ModelParameters): void {
  validateLogNormal('rtt', params.rtt);
  validateLogNormal('serverDelay', params.serverDelay);

  const { cleanProbability, min, max } = params.loss;
  requireFinite('loss.cleanProbability', cleanProbability);
  if (cleanProbability < 0 || cleanProbability > 1) {
    fail('loss.cleanProbability', cleanProbability, 'must be in [0, 1]');
  }
  requireFinite('loss.min', min);
  requireFinite('loss.max', max);
  if (min <= 0) {
    fail('loss.min', min, 'must be positive');
  }
  if (max < min || max > 1) {
    fail('loss.max', max, 'must be in [loss.min, 1]');
  }

  const { scale, lossWeight, noiseMin, noiseMax, floor } = params.throughput;
  for (const [key, value] of Object.entries({ scale, lossWeight, noiseMin, noiseMax, floor })) {
    requireFinite(`throughput.${key}`, value);
  }
  if (scale <= 0) fail('throughput.scale', scale, 'must be positive');
  if (lossWeight < 0) fail('throughput.lossWeight', lossWeight, 'must be non-negative');
  if (noiseMin <= 0) fail('throughput.noiseMin', noiseMin, 'must be positive');
  if (noiseMax < noiseMin) fail('throughput.noiseMax', noiseMax, 'must be >= throughput.noiseMin');
  if (floor <= 0) fail('throughput.floor', floor, 'must be positive');
}

function validateLogNormal(path: string, params: LogNormalParameters): void {
  requireFinite(`${path}.mu`, params.mu);
  requireFinite(`${path}.sigma`, params.sigma);
  if (params.sigma < 0) {
    fail(`${path}.sigma`, params.sigma, 'must be non-negative');
  }
}

function requireFinite(path: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail(path, value, 'must be a finite number');
  }
}

function fail(path: string, value: unknown, reason: string): never {
  throw new NetsynthError(ErrorCode.INVALID_CONFIG, `Model parameter ${path} ${reason}`, {
    path,
    value,
  });
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null) {
      Object.freeze(nested);
    }
  }
  return Object.freeze(value);
}
