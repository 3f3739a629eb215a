/**
 * Sample Validator
 *
 * Checks the invariants downstream consumers rely on:
 * rtt > 0, serverDelay > 0, ttfb = rtt + serverDelay (so ttfb >= rtt),
 * 0 <= loss <= loss.max, throughput >= floor.
 */

import { NetsynthError, ErrorCode } from '../../core/errors';
import { DEFAULT_MODEL_PARAMETERS, type ModelParameters } from '../../model/parameters';
import type { NetworkSample } from '../types/sample';

/** Relative tolerance for ttfb = rtt + serverDelay */
const TTFB_TOLERANCE = 1e-9;

export interface SampleViolation {
  row: number;
  field: keyof NetworkSample;
  value: number;
  rule: string;
}

export class SampleValidator {
  /**
   * Throw DATA_QUALITY on the first row that breaks an invariant.
   * Defaults to the table's own parameters when it carries them.
   */
  static validateTable(
    rows: Iterable<NetworkSample> & { metadata?: { parameters: Readonly<ModelParameters> } },
    parameters?: Readonly<ModelParameters>
  ): void {
    const params = parameters ?? rows.metadata?.parameters ?? DEFAULT_MODEL_PARAMETERS;
    let index = 0;
    for (const row of rows) {
      const violation = this.checkRow(row, index, params);
      if (violation) {
        throw new NetsynthError(
          ErrorCode.DATA_QUALITY,
          `Row ${violation.row} violates ${violation.rule}`,
          { ...violation }
        );
      }
      index++;
    }
  }

  /**
   * Every violation across all rows, at most one per row
   */
  static collectViolations(
    rows: Iterable<NetworkSample>,
    parameters: Readonly<ModelParameters> = DEFAULT_MODEL_PARAMETERS
  ): SampleViolation[] {
    const violations: SampleViolation[] = [];
    let index = 0;
    for (const row of rows) {
      const violation = this.checkRow(row, index, parameters);
      if (violation) violations.push(violation);
      index++;
    }
    return violations;
  }

  static checkRow(
    row: NetworkSample,
    index: number,
    parameters: Readonly<ModelParameters>
  ): SampleViolation | null {
    const violation = (field: keyof NetworkSample, rule: string): SampleViolation => ({
      row: index,
      field,
      value: row[field],
      rule,
    });

    if (!(row.rtt > 0) || !Number.isFinite(row.rtt)) {
      return violation('rtt', 'rtt > 0');
    }
    if (!(row.serverDelay > 0) || !Number.isFinite(row.serverDelay)) {
      return violation('serverDelay', 'serverDelay > 0');
    }
    if (!(row.ttfb >= row.rtt)) {
      return violation('ttfb', 'ttfb >= rtt');
    }
    const expectedTtfb = row.rtt + row.serverDelay;
    if (Math.abs(row.ttfb - expectedTtfb) > TTFB_TOLERANCE * expectedTtfb) {
      return violation('ttfb', 'ttfb = rtt + serverDelay');
    }
    if (!(row.loss >= 0 && row.loss <= parameters.loss.max)) {
      return violation('loss', `0 <= loss <= ${parameters.loss.max}`);
    }
    if (!(row.throughput >= parameters.throughput.floor) || !Number.isFinite(row.throughput)) {
      return violation('throughput', `throughput >= ${parameters.throughput.floor}`);
    }
    return null;
  }
}
