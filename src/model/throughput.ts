/**
 * Throughput cost model
 *
 *   total_cost = rtt + ttfb + loss · lossWeight
 *   base       = scale / total_cost
 *   observed   = max(base · noise, floor)
 *
 * Base throughput strictly decreases in rtt, ttfb and loss (for lossWeight > 0).
 */

import { NetsynthError, ErrorCode } from '../core/errors';
import type { ThroughputParameters } from './parameters';

export function totalCost(
  rtt: number,
  ttfb: number,
  loss: number,
  params: Pick<ThroughputParameters, 'lossWeight'>
): number {
  return rtt + ttfb + loss * params.lossWeight;
}

/**
 * scale / total_cost. A non-positive or non-finite cost has no throughput
 * and raises NUMERIC_DEGENERACY.
 */
export function baseThroughput(
  rtt: number,
  ttfb: number,
  loss: number,
  params: Pick<ThroughputParameters, 'scale' | 'lossWeight'>
): number {
  const cost = totalCost(rtt, ttfb, loss, params);
  if (!Number.isFinite(cost) || cost <= 0) {
    throw new NetsynthError(ErrorCode.NUMERIC_DEGENERACY, 'Total cost must be positive and finite', {
      rtt,
      ttfb,
      loss,
      totalCost: cost,
    });
  }
  return params.scale / cost;
}

export function observedThroughput(base: number, noise: number, floor: number): number {
  return Math.max(base * noise, floor);
}
