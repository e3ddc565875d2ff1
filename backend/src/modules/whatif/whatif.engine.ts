/**
 * WHAT-IF ENGINE
 *
 *   raw records ─► Baseline Resolver ─► Impact Calculator ─┬─► Insight Generator
 *                                                          └─► Impact Aggregator
 *
 * Synchronous and side-effect free. Clock and id factory are injected so a
 * run is reproducible end to end.
 */

import { v4 as uuidv4 } from 'uuid';
import type { RawBatch } from '../behavior/behavior.contract.js';
import type { IngestReport } from '../behavior/behavior.ingest.js';
import { resolveBaselines } from './baseline.resolver.js';
import { aggregateImpact } from './impact.aggregator.js';
import { calculateImpact } from './impact.calculator.js';
import { generateInsights } from './insight.generator.js';
import { eventName } from './whatif.catalog.js';
import { CONFIDENCE_SCORE } from './whatif.contract.js';
import type {
  BaselineEntry,
  EngineResult,
  SimulationOutcome,
  SimulationRequest,
} from './whatif.contract.js';

export interface WhatIfEngineConfig {
  modelVersion: string;
  confidenceScore: number;
  clock: () => Date;
  idFactory: () => string;
}

export const DEFAULT_ENGINE_CONFIG: WhatIfEngineConfig = {
  modelVersion: '1.0.0',
  confidenceScore: CONFIDENCE_SCORE,
  clock: () => new Date(),
  idFactory: () => uuidv4(),
};

export class WhatIfEngine {
  private readonly config: WhatIfEngineConfig;

  constructor(config: Partial<WhatIfEngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
  }

  simulate(batch: RawBatch, request: SimulationRequest): SimulationOutcome {
    const { baselines, report } = resolveBaselines(batch);
    if (baselines.size === 0) {
      return { status: 'NO_DATA', ingest: report };
    }
    return this.simulateFromBaselines(baselines, request, report);
  }

  simulateFromBaselines(
    baselines: ReadonlyMap<string, BaselineEntry>,
    request: SimulationRequest,
    ingest: IngestReport
  ): SimulationOutcome {
    const { eventType, parameters, persona, region, durationDays, locale } = request;
    const filter = { persona, region };

    const results = calculateImpact({ baselines, eventType, params: parameters, filter });
    if (results.size === 0) {
      return { status: 'NO_MATCHING_SEGMENTS', filter, ingest };
    }

    const result: EngineResult = {
      event: eventName(eventType, locale),
      event_type: eventType,
      parameters: { ...parameters },
      results: Object.fromEntries(results),
      insights: generateInsights(eventType, results, parameters, locale),
      projected_impact: aggregateImpact(eventType, results, parameters, this.config.confidenceScore),
      confidence_score: this.config.confidenceScore,
      metadata: {
        simulation_id: this.config.idFactory(),
        simulation_time: this.config.clock().toISOString(),
        duration_days: durationDays,
        model_version: this.config.modelVersion,
        locale,
      },
    };

    return { status: 'OK', result, ingest };
  }
}
