/**
 * Descriptive statistics for a generated table.
 *
 * Column descriptions follow the usual describe() layout: count, mean, sample
 * standard deviation, min, quartiles, max.
 */

import jStat from 'jstat';
import { NetsynthError, ErrorCode } from '../core/errors';
import type { SampleTable } from '../domain/table/SampleTable';
import { PUBLIC_COLUMNS } from '../domain/types/sample';

export interface ColumnDescription {
  count: number;
  mean: number;
  std: number;
  min: number;
  q25: number;
  q50: number;
  q75: number;
  max: number;
}

export type PublicColumn = (typeof PUBLIC_COLUMNS)[number];

export interface TableSummary {
  sampleCount: number;
  columns: Record<PublicColumn, ColumnDescription>;
  lossyCount: number;
  lossyFraction: number;
  meanRtt: number;
  meanTtfb: number;
  meanThroughput: number;
  rttThroughputCorrelation: number;
}

export function describeColumn(values: number[]): ColumnDescription {
  if (values.length === 0) {
    throw new NetsynthError(ErrorCode.INSUFFICIENT_DATA, 'Cannot describe an empty column');
  }

  // Type-7 linear interpolation; jstat needs two points to interpolate between
  const [q25, q50, q75] =
    values.length > 1 ? jStat.quantiles(values, [0.25, 0.5, 0.75], 1, 1) : [values[0], values[0], values[0]];

  return {
    count: values.length,
    mean: jStat.mean(values),
    // Sample std is undefined for a single value
    std: values.length > 1 ? jStat.stdev(values, true) : NaN,
    min: jStat.min(values),
    q25,
    q50,
    q75,
    max: jStat.max(values),
  };
}

/**
 * Pearson correlation coefficient of two equal-length series
 */
export function pearson(x: number[], y: number[]): number {
  if (x.length !== y.length) {
    throw new NetsynthError(ErrorCode.INVALID_DATA, 'Series must have equal length', {
      xLength: x.length,
      yLength: y.length,
    });
  }
  if (x.length < 2) {
    throw new NetsynthError(ErrorCode.INSUFFICIENT_DATA, 'Correlation needs at least 2 points', {
      length: x.length,
    });
  }
  if (jStat.stdev(x) === 0 || jStat.stdev(y) === 0) {
    throw new NetsynthError(ErrorCode.INSUFFICIENT_DATA, 'Correlation is undefined for a constant series');
  }

  return jStat.corrcoeff(x, y);
}

export function summarize(table: SampleTable): TableSummary {
  const rtt = table.column('rtt');
  const ttfb = table.column('ttfb');
  const loss = table.column('loss');
  const throughput = table.column('throughput');

  const lossyCount = loss.filter((value) => value > 0).length;

  return {
    sampleCount: table.size,
    columns: {
      rtt: describeColumn(rtt),
      ttfb: describeColumn(ttfb),
      loss: describeColumn(loss),
      throughput: describeColumn(throughput),
    },
    lossyCount,
    lossyFraction: lossyCount / table.size,
    meanRtt: jStat.mean(rtt),
    meanTtfb: jStat.mean(ttfb),
    meanThroughput: jStat.mean(throughput),
    rttThroughputCorrelation: table.size > 1 ? pearson(rtt, throughput) : NaN,
  };
}

/**
 * Render a summary as the report printed by the CLI
 */
export function formatSummary(summary: TableSummary): string {
  const rule = '='.repeat(70);
  const stats: Array<keyof ColumnDescription> = ['count', 'mean', 'std', 'min', 'q25', 'q50', 'q75', 'max'];
  const labels: Record<keyof ColumnDescription, string> = {
    count: 'count',
    mean: 'mean',
    std: 'std',
    min: 'min',
    q25: '25%',
    q50: '50%',
    q75: '75%',
    max: 'max',
  };

  const header = ['', ...PUBLIC_COLUMNS].map((cell) => cell.padStart(12)).join('');
  const tableLines = stats.map((stat) =>
    [
      labels[stat].padEnd(12),
      ...PUBLIC_COLUMNS.map((column) => formatNumber(summary.columns[column][stat]).padStart(12)),
    ].join('')
  );

  const lossyPercent = (summary.lossyFraction * 100).toFixed(1);

  return [
    rule,
    'SUMMARY STATISTICS',
    rule,
    header,
    ...tableLines,
    '',
    rule,
    'DATA CHARACTERISTICS',
    rule,
    `• Samples with packet loss: ${summary.lossyCount} (${lossyPercent}%)`,
    `• Mean RTT: ${summary.meanRtt.toFixed(2)} ms`,
    `• Mean TTFB: ${summary.meanTtfb.toFixed(2)} ms`,
    `• Mean Throughput: ${summary.meanThroughput.toFixed(2)} Mbps`,
    `• RTT-Throughput Correlation: ${summary.rttThroughputCorrelation.toFixed(3)}`,
  ].join('\n');
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  return Number.isInteger(value) ? String(value) : value.toFixed(6);
}
