/**
 * WHAT-IF ENGINE: Insight Generator
 *
 * Reads the mean delta per brand across segment results and emits templated
 * statements: the general statement first, brand call-outs after.
 */

import { mean } from '../../common/math.js';
import { mapBrands } from '../behavior/behavior.contract.js';
import type { BrandShares } from '../behavior/behavior.contract.js';
import { INSIGHT_MESSAGES } from './insight.messages.js';
import type { InsightMessages } from './insight.messages.js';
import { DEFAULT_LOCALE, isEventType } from './whatif.contract.js';
import type { EventType, Locale, SegmentResult, SimulationParameters } from './whatif.contract.js';

export const FALLBACK_INSIGHT = INSIGHT_MESSAGES[DEFAULT_LOCALE].fallback;

export function averageDeltas(results: Iterable<SegmentResult>): BrandShares {
  const list = Array.from(results);
  return mapBrands((brand) => mean(list.map((r) => r.delta[brand])));
}

type InsightRule = (avg: BrandShares, params: SimulationParameters, text: InsightMessages) => string[];

const pts = (value: number): string => value.toFixed(1);

const INSIGHT_RULES: Record<EventType, InsightRule> = {
  price_change: (avg, params, text) => {
    if (params.electricity_price <= 1.0) {
      return [text.priceUnchanged];
    }
    const out = [text.priceRaised(Math.round((params.electricity_price - 1) * 100))];
    if (avg.Other > 0) {
      out.push(text.otherGain(pts(avg.Other)));
    }
    if (avg['7-11'] < 0) {
      out.push(text.sevenLoss(pts(Math.abs(avg['7-11']))));
    }
    return out;
  },

  promotion: (avg, params, text) => {
    const out: string[] = [];
    if (params.promotion_intensity > 1.0) {
      out.push(text.promotionIntensity(params.promotion_intensity));
      if (params.point_multiplier > 1.0) {
        out.push(text.promotionPoints(params.point_multiplier));
      }
    }
    if (avg.FamilyMart > 0) {
      out.push(text.familyGain(pts(avg.FamilyMart)));
    }
    return out;
  },

  competition: (avg, _params, text) => {
    const out = [text.competitionWatch];
    if (avg.FamilyMart > 0) {
      out.push(text.competitionFreshGrad);
    }
    return out;
  },

  external: (_avg, _params, text) => [text.externalSeasonal],
};

export function generateInsights(
  eventType: string,
  results: ReadonlyMap<string, SegmentResult>,
  params: SimulationParameters,
  locale: Locale = DEFAULT_LOCALE
): string[] {
  const text = INSIGHT_MESSAGES[locale];
  if (results.size === 0) return [text.fallback];

  const insights = isEventType(eventType)
    ? INSIGHT_RULES[eventType](averageDeltas(results.values()), params, text)
    : [];

  return insights.length > 0 ? insights : [text.fallback];
}
