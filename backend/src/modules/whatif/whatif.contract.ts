/**
 * WHAT-IF ENGINE: Contract
 */

import type { BrandShares } from '../behavior/behavior.contract.js';
import type { IngestReport } from '../behavior/behavior.ingest.js';

// ═══════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════

export const EVENT_TYPES = ['price_change', 'promotion', 'competition', 'external'] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some((t) => t === value);
}

// ═══════════════════════════════════════════════════════════════
// LOCALES (event names & insight text)
// ═══════════════════════════════════════════════════════════════

export const LOCALES = ['en', 'zh-TW'] as const;

export type Locale = (typeof LOCALES)[number];

export const DEFAULT_LOCALE: Locale = 'en';

// ═══════════════════════════════════════════════════════════════
// PARAMETERS
// ═══════════════════════════════════════════════════════════════

export interface SimulationParameters {
  electricity_price: number;   // multiplier, 1.0 = no change
  point_multiplier: number;
  promotion_intensity: number;
  price_sensitivity: number;   // accepted, not used by any rule yet
}

export interface ParameterBound {
  min: number;
  max: number;
  default: number;
  description: string;
}

export const PARAMETER_BOUNDS: Record<keyof SimulationParameters, ParameterBound> = {
  electricity_price: {
    min: 0.5,
    max: 3.0,
    default: 1.0,
    description: 'Electricity price multiplier (1.0 = no change)',
  },
  point_multiplier: {
    min: 0.5,
    max: 5.0,
    default: 1.0,
    description: 'Loyalty point earning multiplier',
  },
  promotion_intensity: {
    min: 0.0,
    max: 2.0,
    default: 1.0,
    description: 'Promotion intensity (0-2)',
  },
  price_sensitivity: {
    min: 0.5,
    max: 2.0,
    default: 1.0,
    description: 'Consumer price sensitivity',
  },
};

export const DEFAULT_PARAMETERS: SimulationParameters = {
  electricity_price: PARAMETER_BOUNDS.electricity_price.default,
  point_multiplier: PARAMETER_BOUNDS.point_multiplier.default,
  promotion_intensity: PARAMETER_BOUNDS.promotion_intensity.default,
  price_sensitivity: PARAMETER_BOUNDS.price_sensitivity.default,
};

export const DURATION_DAYS = { min: 1, max: 365, default: 30 } as const;

// Declared model confidence. Not derived from data.
export const CONFIDENCE_SCORE = 0.85;

// ═══════════════════════════════════════════════════════════════
// BASELINE & RESULTS
// ═══════════════════════════════════════════════════════════════

export interface BaselineEntry {
  key: string;
  group: string;
  region: string;
  brandPercentages: BrandShares;
  avgSatisfaction: number;
  timestamp: string;
}

export interface SegmentFilter {
  persona?: string;
  region?: string;
}

export interface SegmentResult {
  group: string;
  region: string;
  projected: BrandShares; // rounded to 1 decimal
  delta: BrandShares;     // projected − baseline, rounded to 1 decimal
}

export interface ProjectedImpact {
  avg_brand_shift_percent: number;
  confidence_score: number;
  affected_personas: number;
  estimated_revenue_change: number;
}

// ═══════════════════════════════════════════════════════════════
// REQUEST / RESULT
// ═══════════════════════════════════════════════════════════════

export interface SimulationRequest {
  eventType: EventType;
  parameters: SimulationParameters;
  persona?: string;
  region?: string;
  durationDays: number;
  locale: Locale;
}

// Wire shape: snake_case throughout

export interface SimulationMetadata {
  simulation_id: string;
  simulation_time: string;
  duration_days: number;
  model_version: string;
  locale: Locale;
}

export interface EngineResult {
  event: string;
  event_type: EventType;
  parameters: SimulationParameters;
  results: Record<string, SegmentResult>;
  insights: string[];
  projected_impact: ProjectedImpact;
  confidence_score: number;
  metadata: SimulationMetadata;
}

export type SimulationOutcome =
  | { status: 'OK'; result: EngineResult; ingest: IngestReport }
  | { status: 'NO_DATA'; ingest: IngestReport }
  | { status: 'NO_MATCHING_SEGMENTS'; filter: SegmentFilter; ingest: IngestReport };
