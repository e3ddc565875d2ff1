/**
 * WHAT-IF ENGINE: Routes
 *
 * ROUTES:
 * - GET  /api/v1/simulation           - Event catalog & parameter ranges (?lang=en|zh-TW)
 * - POST /api/v1/simulation/simulate  - Run a what-if simulation
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError, NotFoundError, ValidationError, formatIssues } from '../../common/errors.js';
import type { BehaviorRecordSource } from '../behavior/behavior.source.js';
import { buildSimulationCatalog } from './whatif.catalog.js';
import type { WhatIfEngine } from './whatif.engine.js';
import { CatalogQuerySchema, SimulationRequestSchema, toSimulationRequest } from './whatif.schema.js';
import { WhatIfService } from './whatif.service.js';

export interface WhatIfRouteDeps {
  source: BehaviorRecordSource;
  engine: WhatIfEngine;
}

export async function registerWhatIfRoutes(
  app: FastifyInstance,
  deps: WhatIfRouteDeps
): Promise<void> {
  const prefix = '/api/v1/simulation';
  const service = new WhatIfService(deps.source, deps.engine);

  // ─────────────────────────────────────────────────────────────
  // Catalog
  // ─────────────────────────────────────────────────────────────
  app.get(prefix, async (request: FastifyRequest<{ Querystring: Record<string, string> }>) => {
    const query = CatalogQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new ValidationError('Invalid query parameters', formatIssues(query.error.issues));
    }
    return { ok: true, ...buildSimulationCatalog(query.data.lang) };
  });

  // ─────────────────────────────────────────────────────────────
  // Simulate
  // ─────────────────────────────────────────────────────────────
  app.post(`${prefix}/simulate`, async (request: FastifyRequest<{ Body: unknown }>) => {
    const body = SimulationRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      throw new ValidationError('Invalid simulation request', formatIssues(body.error.issues));
    }

    const outcome = await service.simulate(toSimulationRequest(body.data));

    switch (outcome.status) {
      case 'NO_DATA':
        throw new NotFoundError(
          'NO_DATA',
          'No baseline behavior data found. Please check data sources.'
        );
      case 'NO_MATCHING_SEGMENTS':
        throw new AppError(
          'NO_MATCHING_SEGMENTS',
          'No data matches the specified persona/region filters.',
          400,
          { persona: outcome.filter.persona ?? null, region: outcome.filter.region ?? null }
        );
      case 'OK':
        request.log.info(
          { eventType: outcome.result.event_type, segments: outcome.result.projected_impact.affected_personas },
          'simulation complete'
        );
        return { ok: true, ...outcome.result, ingest: outcome.ingest };
    }
  });
}
