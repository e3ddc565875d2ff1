/**
 * BEHAVIOR DATA: Intel Readers
 *
 * Rows that fail their schema are dropped one by one; a bad nested item
 * (one holiday, one post) never drops the whole day.
 */

import type { z } from 'zod';
import type { RawBatch } from './behavior.contract.js';
import { isPlainObject } from './behavior.ingest.js';
import {
  DailyIntelReportSchema,
  HolidayEventSchema,
  MAX_SOCIAL_POSTS,
  SocialPostSchema,
  WeatherInfoSchema,
} from './intel.contract.js';
import type { DailyIntelReport, WebIntel } from './intel.contract.js';

function rowsForDate(batch: RawBatch, date?: string): Record<string, unknown>[] {
  return batch.rows
    .map((row) => row.value)
    .filter(isPlainObject)
    .filter((value) => !date || value.date === date);
}

function parseEach<S extends z.ZodTypeAny>(schema: S, values: unknown, max?: number): Array<z.infer<S>> {
  if (!Array.isArray(values)) return [];

  const out: Array<z.infer<S>> = [];
  for (const value of values.slice(0, max)) {
    const parsed = schema.safeParse(value);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

function strings(values: unknown): string[] {
  return Array.isArray(values) ? values.filter((v): v is string => typeof v === 'string') : [];
}

export interface DailyIntelSelection {
  reports: DailyIntelReport[];
  dropped: number;
}

/**
 * Date filter and limit apply to raw rows; invalid rows are dropped after.
 */
export function selectDailyIntel(
  batch: RawBatch,
  options: { date?: string; limit: number }
): DailyIntelSelection {
  const candidates = rowsForDate(batch, options.date).slice(0, options.limit);
  const reports = parseEach(DailyIntelReportSchema, candidates);

  return { reports, dropped: candidates.length - reports.length };
}

/**
 * First record for the date (or the first record overall), or null.
 */
export function selectWebIntel(batch: RawBatch, date?: string): WebIntel | null {
  const [record] = rowsForDate(batch, date);
  if (!record) return null;

  const weather = WeatherInfoSchema.safeParse(record.weather);

  return {
    date: typeof record.date === 'string' ? record.date : '',
    weather: weather.success ? weather.data : null,
    holiday_events: parseEach(HolidayEventSchema, record.holiday_events),
    social_posts: parseEach(SocialPostSchema, record.social_posts, MAX_SOCIAL_POSTS),
    trending_topics: strings(record.trending_topics),
    market_insights: strings(record.market_insights),
  };
}
