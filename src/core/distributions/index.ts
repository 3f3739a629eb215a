/**
 * Sampling distributions used by the generator
 */

export type { SamplingDistribution } from './Distribution';
export { LogNormalDistribution } from './LogNormalDistribution';
export { UniformDistribution } from './UniformDistribution';
export { ZeroInflatedUniform } from './ZeroInflatedUniform';
