/**
 * CSV persistence for sample tables.
 *
 * Header `rtt,ttfb,loss,throughput` (ms, ms, fraction, Mbps), one row per
 * sample in generation order. Numbers use the shortest decimal form that
 * round-trips, so a parsed file reproduces the table's values exactly.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { NetsynthError, ErrorCode, wrapError } from '../core/errors';
import type { SampleTable } from '../domain/table/SampleTable';
import type { SampleRecord } from '../domain/types/sample';

export interface CsvOptions {
  /** Add a server_delay column after rtt. Default: false */
  includeServerDelay?: boolean;
}

const CSV_HEADER = ['rtt', 'ttfb', 'loss', 'throughput'];
const CSV_HEADER_WITH_DELAY = ['rtt', 'server_delay', 'ttfb', 'loss', 'throughput'];

export function toCsv(table: SampleTable, options: CsvOptions = {}): string {
  const includeServerDelay = options.includeServerDelay ?? false;
  const header = includeServerDelay ? CSV_HEADER_WITH_DELAY : CSV_HEADER;

  const lines = [header.join(',')];
  for (const row of table) {
    const values = includeServerDelay
      ? [row.rtt, row.serverDelay, row.ttfb, row.loss, row.throughput]
      : [row.rtt, row.ttfb, row.loss, row.throughput];
    lines.push(values.map(String).join(','));
  }

  return lines.join('\n') + '\n';
}

/**
 * Parse CSV text written by toCsv back into records
 */
export function parseCsv(text: string): SampleRecord[] {
  const lines = text.split(/\r?\n/).filter((line) => line.length > 0);
  const headerLine = lines.shift();
  if (headerLine === undefined) {
    throw new NetsynthError(ErrorCode.INVALID_DATA, 'CSV is empty');
  }

  const header = headerLine.split(',');
  const withDelay = sameColumns(header, CSV_HEADER_WITH_DELAY);
  if (!withDelay && !sameColumns(header, CSV_HEADER)) {
    throw new NetsynthError(ErrorCode.INVALID_DATA, 'Unexpected CSV header', {
      header: headerLine,
    });
  }

  return lines.map((line, i) => {
    const cells = line.split(',');
    if (cells.length !== header.length) {
      throw new NetsynthError(ErrorCode.INVALID_DATA, 'Wrong number of columns', {
        line: i + 2,
        expected: header.length,
        actual: cells.length,
      });
    }

    const values = cells.map((cell, column) => {
      const value = Number(cell);
      if (cell.trim() === '' || Number.isNaN(value)) {
        throw new NetsynthError(ErrorCode.INVALID_DATA, 'Non-numeric CSV value', {
          line: i + 2,
          column: header[column],
          value: cell,
        });
      }
      return value;
    });

    if (withDelay) {
      const [rtt, serverDelay, ttfb, loss, throughput] = values;
      return { rtt, serverDelay, ttfb, loss, throughput };
    }
    const [rtt, ttfb, loss, throughput] = values;
    return { rtt, ttfb, loss, throughput };
  });
}

/**
 * Write the table as CSV, creating parent directories as needed
 */
export async function writeCsv(
  filePath: string,
  table: SampleTable,
  options: CsvOptions = {}
): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, toCsv(table, options), 'utf8');
  } catch (error) {
    const wrapped = wrapError(error, ErrorCode.IO_ERROR);
    throw new NetsynthError(wrapped.code, `Failed to write ${filePath}: ${wrapped.message}`, {
      ...wrapped.context,
      path: filePath,
    });
  }
}

function sameColumns(actual: string[], expected: string[]): boolean {
  return actual.length === expected.length && actual.every((cell, i) => cell.trim() === expected[i]);
}
