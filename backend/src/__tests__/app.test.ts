/**
 * HTTP surface tests (Fastify inject, in-memory record source)
 */

import { afterEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { loadEnv } from '../config/env.js';
import { InMemoryBehaviorSource } from '../modules/behavior/index.js';
import { WhatIfEngine } from '../modules/whatif/index.js';

const RECORDS = [
  {
    timestamp: '2026-01-31T23:00:00Z',
    group: '新鮮人',
    region: '台北',
    brand_percentages: { '7-11': 50, FamilyMart: 30, Other: 20 },
    avg_satisfaction: 0.7,
  },
  {
    timestamp: '2026-02-28T23:00:00Z',
    group: 'FinTech家庭',
    region: '台南',
    brand_percentages: { '7-11': 40, FamilyMart: 40, Other: 20 },
    avg_satisfaction: 0.8,
  },
  { timestamp: '2026-02-01T09:00:00Z', event: 'competition' },
];

const report = (date: string, summary: string) => ({
  date,
  daily_intelligence_summary: summary,
  behavioral_twin_report: { personas: 2 },
  anomaly_detection: null,
  incentive_analysis: { top: 'coupon' },
  metadata: { generator: 'test' },
});

const DAILY_INTEL = [
  report('2026-02-27', 'Quiet day'),
  report('2026-02-28', 'Rainy weekend'),
  { date: '2026-02-28', daily_intelligence_summary: 'missing sections' },
];

const post = (n: number) => ({
  platform: 'ptt',
  board: 'CVS',
  title: `post ${n}`,
  url: `https://example.com/${n}`,
  author: 'tester',
  timestamp: '2026-02-28T10:00:00Z',
  likes: n,
  comments: 0,
});

const WEB_INTEL = [
  {
    date: '2026-02-28',
    weather: {
      location: 'Taipei',
      temperature: 18.5,
      humidity: 85,
      description: 'light rain',
      is_rainy: true,
    },
    holiday_events: [
      {
        name: 'Peace Memorial Day',
        description: 'long weekend',
        start_date: '2026-02-27',
        end_date: '2026-03-01',
        category: 'national',
      },
      { name: 'incomplete' },
    ],
    social_posts: Array.from({ length: 25 }, (_, i) => post(i)),
    trending_topics: ['umbrella', 42],
    market_insights: ['hot drinks up'],
  },
];

let app: FastifyInstance | undefined;

function build(records: unknown[] = RECORDS): FastifyInstance {
  app = buildApp({
    env: loadEnv({ NODE_ENV: 'test' }),
    source: new InMemoryBehaviorSource(records),
    intel: {
      daily: new InMemoryBehaviorSource(DAILY_INTEL),
      web: new InMemoryBehaviorSource(WEB_INTEL),
    },
    startedAt: new Date('2026-03-01T00:00:00.000Z'),
    engine: new WhatIfEngine({
      clock: () => new Date('2026-03-01T08:00:00.000Z'),
      idFactory: () => 'sim-0001',
    }),
    logger: false,
  });
  return app;
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('What-If Impact API', () => {
  describe('GET /api/v1/simulation', () => {
    it('should return the event catalog', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/simulation' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.event_types).toHaveLength(4);
      expect(body.parameters.promotion_intensity.range).toEqual([0, 2]);
    });

    it('should localize the catalog with ?lang', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/simulation?lang=zh-TW' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.locale).toBe('zh-TW');
      expect(body.locales).toEqual(['en', 'zh-TW']);
      expect(body.event_types[0].name).toBe('電價調漲');
    });

    it('should reject an unsupported lang', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/simulation?lang=fr' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/simulation/simulate', () => {
    it('should reject an unknown event type', async () => {
      const res = await build().inject({
        method: 'POST',
        url: '/api/v1/simulation/simulate',
        payload: { event_type: 'tariff' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'Invalid simulation request',
        details: ['event_type: Invalid event_type. Must be one of: price_change, promotion, competition, external'],
      });
    });

    it('should answer NO_DATA when no baseline exists', async () => {
      const res = await build([{ event: 'promotion' }]).inject({
        method: 'POST',
        url: '/api/v1/simulation/simulate',
        payload: { event_type: 'external' },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        ok: false,
        error: 'NO_DATA',
        message: 'No baseline behavior data found. Please check data sources.',
      });
    });

    it('should answer NO_MATCHING_SEGMENTS for an unmatched filter', async () => {
      const res = await build().inject({
        method: 'POST',
        url: '/api/v1/simulation/simulate',
        payload: { event_type: 'competition', persona: 'Retiree' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'NO_MATCHING_SEGMENTS',
        message: 'No data matches the specified persona/region filters.',
        details: { persona: 'Retiree', region: null },
      });
    });

    it('should run a simulation', async () => {
      const res = await build().inject({
        method: 'POST',
        url: '/api/v1/simulation/simulate',
        payload: { event_type: 'competition', region: 'Taipei', duration_days: 14 },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.event).toBe('Competitor action');
      expect(Object.keys(body.results)).toEqual(['新鮮人_台北']);
      expect(body.results['新鮮人_台北'].delta).toEqual({ '7-11': -3, FamilyMart: 8, Other: -5 });
      expect(body.projected_impact).toEqual({
        avg_brand_shift_percent: 5.33,
        confidence_score: 0.85,
        affected_personas: 1,
        estimated_revenue_change: 2.7,
      });
      expect(body.metadata).toEqual({
        simulation_id: 'sim-0001',
        simulation_time: '2026-03-01T08:00:00.000Z',
        duration_days: 14,
        model_version: '1.0.0',
        locale: 'en',
      });
      expect(body.ingest).toEqual({ received: 3, kept: 2, excluded: 1, skipped: [] });
    });

    it('should name the event in the requested lang', async () => {
      const res = await build().inject({
        method: 'POST',
        url: '/api/v1/simulation/simulate',
        payload: { event_type: 'competition', lang: 'zh-TW' },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.event).toBe('競合變化');
      expect(body.metadata.locale).toBe('zh-TW');
    });
  });

  describe('GET /api/v1/behavior', () => {
    it('should filter records and echo the filters', async () => {
      const res = await build().inject({
        method: 'GET',
        url: '/api/v1/behavior?persona=fintech_family&start_date=2026-02-01',
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.count).toBe(1);
      expect(body.data[0].group).toBe('FinTech家庭');
      expect(body.filters_applied).toEqual({
        persona: 'fintech_family',
        region: null,
        start_date: '2026-02-01',
        end_date: null,
        limit: 100,
      });
    });

    it('should apply the limit', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/behavior?limit=1' });

      expect(res.json().count).toBe(1);
    });

    it('should reject a malformed date', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/behavior?start_date=March' });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual(['start_date: expected YYYY-MM-DD']);
    });
  });

  describe('GET /api/v1/behavior/summary', () => {
    it('should summarize kept records', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/behavior/summary' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.total_records).toBe(2);
      expect(body.average_satisfaction).toBe(0.75);
      expect(body.top_brand).toBe('7-11');
    });

    it('should answer NO_DATA for an empty source', async () => {
      const res = await build([]).inject({ method: 'GET', url: '/api/v1/behavior/summary' });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('NO_DATA');
    });
  });

  describe('GET /api/v1/behavior/daily-intel', () => {
    it('should filter by date and drop invalid reports', async () => {
      const res = await build().inject({
        method: 'GET',
        url: '/api/v1/behavior/daily-intel?date=2026-02-28',
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.count).toBe(1);
      expect(body.data[0].daily_intelligence_summary).toBe('Rainy weekend');
    });

    it('should apply the limit', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/behavior/daily-intel?limit=1' });

      const body = res.json();
      expect(body.count).toBe(1);
      expect(body.data[0].date).toBe('2026-02-27');
    });

    it('should reject a malformed date', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/behavior/daily-intel?date=Feb' });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual(['date: expected YYYY-MM-DD']);
    });

    it('should reject a limit above 100', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/behavior/daily-intel?limit=101' });

      expect(res.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/behavior/web-intel', () => {
    it('should return the day with nested items validated', async () => {
      const res = await build().inject({
        method: 'GET',
        url: '/api/v1/behavior/web-intel?date=2026-02-28',
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.weather).toEqual({
        location: 'Taipei',
        temperature: 18.5,
        humidity: 85,
        description: 'light rain',
        is_rainy: true,
        comfort_index: null,
      });
      expect(body.holiday_events).toHaveLength(1);
      expect(body.holiday_events[0].related_keywords).toEqual([]);
      expect(body.social_posts).toHaveLength(20);
      expect(body.social_posts[19].title).toBe('post 19');
      expect(body.trending_topics).toEqual(['umbrella']);
      expect(body.market_insights).toEqual(['hot drinks up']);
    });

    it('should answer NO_WEB_INTEL for a day without data', async () => {
      const res = await build().inject({
        method: 'GET',
        url: '/api/v1/behavior/web-intel?date=2026-01-01',
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        ok: false,
        error: 'NO_WEB_INTEL',
        message: 'No web intel found for date: 2026-01-01',
      });
    });
  });

  describe('Health & fallbacks', () => {
    it('should report health with source counts', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.status).toBe('healthy');
      expect(body.source.kept).toBe(2);
    });

    it('should answer the liveness check', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/health/live' });

      expect(res.json().status).toBe('alive');
    });

    it('should be ready when records are readable', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/health/ready' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ok: true, status: 'ready', message: 'Service is ready' });
    });

    it('should answer 503 from readiness when no record is usable', async () => {
      const res = await build([]).inject({ method: 'GET', url: '/api/health/ready' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        ok: false,
        status: 'not_ready',
        message: 'No behavior records available',
      });
    });

    it('should report process metrics', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v1/metrics' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.memory.rss_mb).toBeGreaterThan(0);
      expect(body.cpu.cores).toBeGreaterThan(0);
    });

    it('should return NOT_FOUND for unknown routes', async () => {
      const res = await build().inject({ method: 'GET', url: '/api/v2/nothing' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
    });
  });
});
