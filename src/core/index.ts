/**
 * Core netsynth module exports
 */

// Error handling system
export { NetsynthError, ErrorCode, isNetsynthError, wrapError } from './errors';

// Random streams
export { RNG, assertValidSeed, seedWords } from './math/random';

// Distributions
export * from './distributions';
