/**
 * WHAT-IF ENGINE: Impact Calculator
 *
 * Deterministic, per-event transformation of a baseline distribution.
 *
 * RULES (v1):
 * -----------
 * price_change   f = electricity_price − 1
 *                PRICE_SENSITIVE: 7-11 −0.08f, FamilyMart −0.07f, Other +0.15f
 *                RESILIENT:       7-11 −0.05f, FamilyMart −0.05f, Other +0.10f
 *                clamp each to [0, 100], renormalize to 100
 * promotion      FamilyMart +(p−1)·0.12·m, Other −half of that, both in [0, 100]
 *                7-11 = 100 − FamilyMart − Other
 * competition    PRICE_SENSITIVE: FamilyMart +8, 7-11 −3
 *                RESILIENT:       FamilyMart +4, 7-11 −2
 *                Other = 100 − FamilyMart − 7-11
 *
 * The residual brand (7-11 for promotion, Other for competition) takes what
 * is left of 100. When the other two already exceed 100 the residual is 0
 * and all three are renormalized.
 * external       7-11 +2, FamilyMart +1, Other −3 (≥0), renormalize to 100
 * (unknown)      baseline unchanged
 *
 * Renormalization on a zero total falls back to 33.33 per brand.
 * Rounding to 1 decimal happens once, after all arithmetic.
 */

import { clamp, round1 } from '../../common/math.js';
import { BRANDS, mapBrands } from '../behavior/behavior.contract.js';
import type { Brand, BrandShares } from '../behavior/behavior.contract.js';
import { matchesPersona, matchesRegion, personaTier } from '../behavior/persona.catalog.js';
import type { PriceTier } from '../behavior/persona.catalog.js';
import { isEventType } from './whatif.contract.js';
import type {
  BaselineEntry,
  EventType,
  SegmentFilter,
  SegmentResult,
  SimulationParameters,
} from './whatif.contract.js';

export const EQUAL_SPLIT = 33.33;

type Transform = (
  base: BrandShares,
  params: SimulationParameters,
  tier: PriceTier
) => BrandShares;

// Per unit of (electricity_price − 1)
const PRICE_SHIFT: Record<PriceTier, BrandShares> = {
  PRICE_SENSITIVE: { '7-11': 0.08, FamilyMart: 0.07, Other: 0.15 },
  RESILIENT: { '7-11': 0.05, FamilyMart: 0.05, Other: 0.1 },
};

const COMPETITION_SHIFT: Record<PriceTier, { familyGain: number; sevenLoss: number }> = {
  PRICE_SENSITIVE: { familyGain: 8.0, sevenLoss: 3.0 },
  RESILIENT: { familyGain: 4.0, sevenLoss: 2.0 },
};

const EXTERNAL_SHIFT: BrandShares = { '7-11': 2.0, FamilyMart: 1.0, Other: -3.0 };

const PROMOTION_RATE = 0.12;

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function renormalize(shares: BrandShares): BrandShares {
  const total = BRANDS.reduce((sum, b) => sum + shares[b], 0);
  if (total <= 0) {
    return mapBrands(() => EQUAL_SPLIT);
  }
  return mapBrands((b) => (shares[b] / total) * 100);
}

export function fillResidual(shares: BrandShares, residual: Brand): BrandShares {
  const taken = BRANDS.reduce((sum, b) => (b === residual ? sum : sum + shares[b]), 0);
  const rest = 100 - taken;

  if (rest < 0) {
    return renormalize(mapBrands((b) => (b === residual ? 0 : shares[b])));
  }
  return mapBrands((b) => (b === residual ? rest : shares[b]));
}

// ═══════════════════════════════════════════════════════════════
// TRANSFORMS
// ═══════════════════════════════════════════════════════════════

export const applyPriceChange: Transform = (base, params, tier) => {
  const f = params.electricity_price - 1.0;
  const shift = PRICE_SHIFT[tier];

  return renormalize({
    '7-11': clamp(base['7-11'] - shift['7-11'] * f, 0, 100),
    FamilyMart: clamp(base.FamilyMart - shift.FamilyMart * f, 0, 100),
    Other: clamp(base.Other + shift.Other * f, 0, 100),
  });
};

export const applyPromotion: Transform = (base, params) => {
  const toFamily = (params.promotion_intensity - 1) * PROMOTION_RATE * params.point_multiplier;
  const fromOther = toFamily * 0.5;

  return fillResidual(
    {
      '7-11': 0,
      FamilyMart: clamp(base.FamilyMart + toFamily, 0, 100),
      Other: clamp(base.Other - fromOther, 0, 100),
    },
    '7-11'
  );
};

export const applyCompetition: Transform = (base, _params, tier) => {
  const { familyGain, sevenLoss } = COMPETITION_SHIFT[tier];

  return fillResidual(
    {
      '7-11': clamp(base['7-11'] - sevenLoss, 0, 100),
      FamilyMart: clamp(base.FamilyMart + familyGain, 0, 100),
      Other: 0,
    },
    'Other'
  );
};

export const applyExternal: Transform = (base) =>
  renormalize({
    '7-11': base['7-11'] + EXTERNAL_SHIFT['7-11'],
    FamilyMart: base.FamilyMart + EXTERNAL_SHIFT.FamilyMart,
    Other: Math.max(0, base.Other + EXTERNAL_SHIFT.Other),
  });

export const EVENT_TRANSFORMS: Record<EventType, Transform> = {
  price_change: applyPriceChange,
  promotion: applyPromotion,
  competition: applyCompetition,
  external: applyExternal,
};

// ═══════════════════════════════════════════════════════════════
// SEGMENT PROJECTION
// ═══════════════════════════════════════════════════════════════

/**
 * Unrounded projection for one baseline. Unknown event types are a no-op.
 */
export function projectShares(
  baseline: BaselineEntry,
  eventType: string,
  params: SimulationParameters
): BrandShares {
  if (!isEventType(eventType)) {
    return { ...baseline.brandPercentages };
  }
  return EVENT_TRANSFORMS[eventType](baseline.brandPercentages, params, personaTier(baseline.group));
}

export function projectSegment(
  baseline: BaselineEntry,
  eventType: string,
  params: SimulationParameters
): SegmentResult {
  const raw = projectShares(baseline, eventType, params);

  return {
    group: baseline.group,
    region: baseline.region,
    projected: mapBrands((b) => round1(raw[b])),
    delta: mapBrands((b) => round1(raw[b] - baseline.brandPercentages[b])),
  };
}

export function matchesFilter(baseline: BaselineEntry, filter: SegmentFilter): boolean {
  if (filter.persona && !matchesPersona(baseline.group, filter.persona)) return false;
  if (filter.region && !matchesRegion(baseline.region, filter.region)) return false;
  return true;
}

/**
 * Segment results for every baseline that passes the filter, keyed like the
 * baselines. An empty map means the filter matched nothing.
 */
export function calculateImpact(input: {
  baselines: ReadonlyMap<string, BaselineEntry>;
  eventType: string;
  params: SimulationParameters;
  filter?: SegmentFilter;
}): Map<string, SegmentResult> {
  const { baselines, eventType, params, filter = {} } = input;
  const results = new Map<string, SegmentResult>();

  for (const [key, baseline] of baselines) {
    if (!matchesFilter(baseline, filter)) continue;
    results.set(key, projectSegment(baseline, eventType, params));
  }

  return results;
}
