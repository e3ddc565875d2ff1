/**
 * WHAT-IF ENGINE: Impact Aggregator
 *
 * FORMULA (LOCKED v1):
 * -------------------
 * avgShift = mean(|delta|) over every brand of every segment
 * revenue  = price_change → −2·electricity_price + 2
 *            promotion    → 3·promotion_intensity + point_multiplier
 *            otherwise    → 0.5·avgShift
 */

import { round1, round2 } from '../../common/math.js';
import { BRANDS } from '../behavior/behavior.contract.js';
import { CONFIDENCE_SCORE } from './whatif.contract.js';
import type { ProjectedImpact, SegmentResult, SimulationParameters } from './whatif.contract.js';

export function averageAbsoluteShift(results: Iterable<SegmentResult>): number {
  let total = 0;
  let count = 0;
  for (const r of results) {
    for (const brand of BRANDS) {
      total += Math.abs(r.delta[brand]);
    }
    count++;
  }
  return count > 0 ? total / (count * BRANDS.length) : 0;
}

export function estimateRevenueChange(
  eventType: string,
  params: SimulationParameters,
  avgShift: number
): number {
  switch (eventType) {
    case 'price_change':
      return round1(-params.electricity_price * 2 + 2);
    case 'promotion':
      return round1(params.promotion_intensity * 3 + params.point_multiplier);
    default:
      return round1(avgShift * 0.5);
  }
}

export function aggregateImpact(
  eventType: string,
  results: ReadonlyMap<string, SegmentResult>,
  params: SimulationParameters,
  confidenceScore: number = CONFIDENCE_SCORE
): ProjectedImpact {
  const avgShift = averageAbsoluteShift(results.values());

  return {
    avg_brand_shift_percent: round2(avgShift),
    confidence_score: confidenceScore,
    affected_personas: results.size,
    estimated_revenue_change: estimateRevenueChange(eventType, params, avgShift),
  };
}
