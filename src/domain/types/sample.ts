/**
 * Sample data model
 *
 * One row per synthetic measurement. Units: milliseconds for latencies,
 * a fraction for loss, Mbps for throughput.
 */

import type { ModelParameters } from '../../model/parameters';

/**
 * How random streams are assigned to rows.
 * - 'sequential': one stream for the whole call, rows drawn in order
 * - 'per-row': an independent stream per row, seeded from (seed, rowIndex)
 */
export type SeedingStrategy = 'sequential' | 'per-row';

export interface NetworkSample {
  /** Network round-trip time (ms), latent draw */
  readonly rtt: number;

  /** Server processing delay (ms), latent draw; kept for debugging */
  readonly serverDelay: number;

  /** Time to first byte (ms) = rtt + serverDelay */
  readonly ttfb: number;

  /** Packet loss fraction; exactly 0 in the clean regime */
  readonly loss: number;

  /** Achieved throughput (Mbps), floored */
  readonly throughput: number;
}

/** Columns handed to downstream consumers, in output order */
export const PUBLIC_COLUMNS = ['rtt', 'ttfb', 'loss', 'throughput'] as const;

/** Every column including the server delay latent, in output order */
export const ALL_COLUMNS = ['rtt', 'serverDelay', 'ttfb', 'loss', 'throughput'] as const;

export type SampleColumn = (typeof ALL_COLUMNS)[number];

/**
 * Plain record form of a row as consumers see it
 */
export interface SampleRecord {
  rtt: number;
  ttfb: number;
  loss: number;
  throughput: number;
  serverDelay?: number;
}

export interface TableMetadata {
  readonly sampleCount: number;
  readonly seed: number;
  readonly seeding: SeedingStrategy;
  readonly parameters: Readonly<ModelParameters>;
}
