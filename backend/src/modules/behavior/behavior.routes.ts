/**
 * BEHAVIOR DATA: Routes
 *
 * ROUTES:
 * - GET /api/v1/behavior          - Records with persona/region/date filters
 * - GET /api/v1/behavior/summary  - Aggregated summary across all records
 * - GET /api/v1/behavior/daily-intel - Daily intel reports (date, limit)
 * - GET /api/v1/behavior/web-intel   - Weather, holidays & social posts for a day
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError, formatIssues } from '../../common/errors.js';
import { filterBehaviorRecords, summarizeBehavior } from './behavior.filter.js';
import { ingestRecords } from './behavior.ingest.js';
import type { BehaviorRecordSource, IntelSources } from './behavior.source.js';
import { selectDailyIntel, selectWebIntel } from './intel.service.js';

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const optionalDay = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .optional();

export const BehaviorQuerySchema = z.object({
  persona: optionalText,
  region: optionalText,
  start_date: optionalDay,
  end_date: optionalDay,
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const DailyIntelQuerySchema = z.object({
  date: optionalDay,
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const WebIntelQuerySchema = z.object({
  date: optionalDay,
});

export interface BehaviorRouteDeps {
  source: BehaviorRecordSource;
  intel: IntelSources;
}

export async function registerBehaviorRoutes(
  app: FastifyInstance,
  deps: BehaviorRouteDeps
): Promise<void> {
  const prefix = '/api/v1/behavior';

  // ─────────────────────────────────────────────────────────────
  // Filtered records
  // ─────────────────────────────────────────────────────────────
  app.get(prefix, async (request: FastifyRequest<{ Querystring: Record<string, string> }>) => {
    const query = BehaviorQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new ValidationError('Invalid query parameters', formatIssues(query.error.issues));
    }
    const { persona, region, start_date, end_date, limit } = query.data;

    const { records, report } = ingestRecords(await deps.source.readAll());
    const data = filterBehaviorRecords(records, {
      persona,
      region,
      startDate: start_date,
      endDate: end_date,
    }).slice(0, limit);

    return {
      ok: true,
      count: data.length,
      data,
      filters_applied: {
        persona: persona ?? null,
        region: region ?? null,
        start_date: start_date ?? null,
        end_date: end_date ?? null,
        limit,
      },
      ingest: report,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // Summary
  // ─────────────────────────────────────────────────────────────
  app.get(`${prefix}/summary`, async () => {
    const { records, report } = ingestRecords(await deps.source.readAll());
    const summary = summarizeBehavior(records);

    if (!summary) {
      throw new NotFoundError('NO_DATA', 'No behavior data found');
    }

    return { ok: true, ...summary, ingest: report };
  });

  // ─────────────────────────────────────────────────────────────
  // Daily intel
  // ─────────────────────────────────────────────────────────────
  app.get(`${prefix}/daily-intel`, async (request: FastifyRequest<{ Querystring: Record<string, string> }>) => {
    const query = DailyIntelQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new ValidationError('Invalid query parameters', formatIssues(query.error.issues));
    }

    const { reports, dropped } = selectDailyIntel(await deps.intel.daily.readAll(), query.data);
    if (dropped > 0) {
      request.log.warn({ dropped }, 'invalid daily intel rows dropped');
    }

    return { ok: true, count: reports.length, data: reports };
  });

  // ─────────────────────────────────────────────────────────────
  // Web intel
  // ─────────────────────────────────────────────────────────────
  app.get(`${prefix}/web-intel`, async (request: FastifyRequest<{ Querystring: Record<string, string> }>) => {
    const query = WebIntelQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw new ValidationError('Invalid query parameters', formatIssues(query.error.issues));
    }
    const { date } = query.data;

    const intel = selectWebIntel(await deps.intel.web.readAll(), date);
    if (!intel) {
      throw new NotFoundError('NO_WEB_INTEL', `No web intel found for date: ${date ?? 'any'}`);
    }

    return { ok: true, ...intel };
  });
}
