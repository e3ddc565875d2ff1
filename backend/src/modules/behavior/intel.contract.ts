/**
 * BEHAVIOR DATA: Intel Contract
 *
 * Two companion JSONL feeds sit next to the behavior file:
 *
 *   daily_intel_report.jsonl  one analyst report per day
 *   daily_web_intel.jsonl     weather, holidays and social posts per day
 *
 * Both are read-only context for analysts; the engine never reads them.
 */

import { z } from 'zod';

const nullable = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((v) => v ?? null);

// ═══════════════════════════════════════════════════════════════
// DAILY INTEL
// ═══════════════════════════════════════════════════════════════

export const DailyIntelReportSchema = z.object({
  date: z.string().min(1),
  daily_intelligence_summary: z.string(),
  behavioral_twin_report: z.record(z.string(), z.unknown()),
  anomaly_detection: nullable(z.string()),
  incentive_analysis: z.record(z.string(), z.unknown()),
  metadata: z.record(z.string(), z.unknown()),
});

export type DailyIntelReport = z.infer<typeof DailyIntelReportSchema>;

// ═══════════════════════════════════════════════════════════════
// WEB INTEL
// ═══════════════════════════════════════════════════════════════

export const WeatherInfoSchema = z.object({
  location: z.string(),
  temperature: z.number().finite(),
  humidity: z.number().int(),
  description: z.string(),
  is_rainy: z.boolean(),
  comfort_index: nullable(z.number().finite()),
});

export const HolidayEventSchema = z.object({
  name: z.string(),
  description: z.string(),
  start_date: z.string(),
  end_date: z.string(),
  category: z.string(),
  related_keywords: z.array(z.string()).default([]),
  impact: nullable(z.string()),
});

export const SocialPostSchema = z.object({
  platform: z.string(),
  board: z.string(),
  title: z.string(),
  url: z.string(),
  author: z.string(),
  timestamp: z.string(),
  likes: z.number().int(),
  comments: z.number().int(),
  keywords: z.array(z.string()).default([]),
  sentiment: z.number().int().default(0),
});

export type WeatherInfo = z.infer<typeof WeatherInfoSchema>;
export type HolidayEvent = z.infer<typeof HolidayEventSchema>;
export type SocialPost = z.infer<typeof SocialPostSchema>;

export const MAX_SOCIAL_POSTS = 20;

export interface WebIntel {
  date: string;
  weather: WeatherInfo | null;
  holiday_events: HolidayEvent[];
  social_posts: SocialPost[];
  trending_topics: string[];
  market_insights: string[];
}
