/**
 * netsynth - seeded generator of correlated synthetic network samples
 *
 * Produces RTT, TTFB, packet loss and throughput rows from a fixed causal
 * model, for evaluating multi-metric server selection before real data exists.
 */

export * from './core';

// Model constants and throughput cost model
export * from './model';

// Generation
export { SampleGenerator, generateSamples } from './generator';
export type { SampleGeneratorOptions } from './generator';

// Data model
export { SampleTable } from './domain/table';
export * from './domain/types';
export { SampleValidator } from './domain/validation';
export type { SampleViolation } from './domain/validation';

// Consumers
export { describeColumn, pearson, summarize, formatSummary } from './analysis/summary';
export type { ColumnDescription, TableSummary } from './analysis/summary';
export { toCsv, parseCsv, writeCsv } from './io/csv';
export type { CsvOptions } from './io/csv';

// Configuration
export {
  loadRunConfig,
  resolveRunConfig,
  parseRunConfigInput,
  DEFAULT_SAMPLE_COUNT,
  DEFAULT_SEED,
  DEFAULT_OUTPUT,
} from './config/RunConfig';
export type { RunConfig, RunConfigInput, LoadRunConfigOptions } from './config/RunConfig';

export const VERSION = '0.1.0';
