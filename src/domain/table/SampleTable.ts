/**
 * Immutable table of generated samples.
 *
 * Built once by the generator and handed to consumers as a finished artifact;
 * rows and metadata are frozen.
 */

import { NetsynthError, ErrorCode } from '../../core/errors';
import type {
  NetworkSample,
  SampleColumn,
  SampleRecord,
  TableMetadata,
} from '../types/sample';

export class SampleTable implements Iterable<NetworkSample> {
  private readonly rows: readonly NetworkSample[];
  readonly metadata: TableMetadata;

  constructor(rows: readonly NetworkSample[], metadata: TableMetadata) {
    if (rows.length !== metadata.sampleCount) {
      throw new NetsynthError(
        ErrorCode.INTERNAL_ERROR,
        'Row count does not match declared sample count',
        { rows: rows.length, sampleCount: metadata.sampleCount }
      );
    }
    this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
    this.metadata = Object.freeze({ ...metadata });
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * Row at `index`; negative indices count from the end
   */
  at(index: number): NetworkSample {
    const row = this.rows.at(index);
    if (row === undefined) {
      throw new NetsynthError(ErrorCode.INVALID_ARGUMENT, 'Row index out of range', {
        index,
        size: this.rows.length,
      });
    }
    return row;
  }

  /**
   * Fresh array of one column's values in generation order
   */
  column(name: SampleColumn): number[] {
    return this.rows.map((row) => row[name]);
  }

  toRecords(options: { includeServerDelay?: boolean } = {}): SampleRecord[] {
    return this.rows.map((row) => {
      const record: SampleRecord = {
        rtt: row.rtt,
        ttfb: row.ttfb,
        loss: row.loss,
        throughput: row.throughput,
      };
      if (options.includeServerDelay) {
        record.serverDelay = row.serverDelay;
      }
      return record;
    });
  }

  /**
   * Bit-for-bit equality of every field of every row
   */
  equals(other: SampleTable): boolean {
    if (other.size !== this.size) return false;

    return this.rows.every((row, i) => {
      const otherRow = other.at(i);
      return (
        Object.is(row.rtt, otherRow.rtt) &&
        Object.is(row.serverDelay, otherRow.serverDelay) &&
        Object.is(row.ttfb, otherRow.ttfb) &&
        Object.is(row.loss, otherRow.loss) &&
        Object.is(row.throughput, otherRow.throughput)
      );
    });
  }

  [Symbol.iterator](): Iterator<NetworkSample> {
    return this.rows[Symbol.iterator]();
  }
}
