/**
 * BEHAVIOR DATA: Contract
 *
 * One line of behavior_twin_monthly.jsonl is one Segment Record:
 * the brand-preference snapshot of a persona/region segment.
 *
 *   { "timestamp": "2026-03-01T00:00:00Z", "group": "新鮮人", "region": "台北",
 *     "brand_percentages": { "7-11": 48.2, "FamilyMart": 31.5, "Other": 20.3 },
 *     "avg_satisfaction": 0.74, ... }
 *
 * Lines carrying an "event" field are simulation artifacts, not observations.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// BRANDS
// ═══════════════════════════════════════════════════════════════

export const BRANDS = ['7-11', 'FamilyMart', 'Other'] as const;

export type Brand = (typeof BRANDS)[number];

export type BrandShares = Record<Brand, number>;

export function mapBrands(fn: (brand: Brand) => number): BrandShares {
  return {
    '7-11': fn('7-11'),
    FamilyMart: fn('FamilyMart'),
    Other: fn('Other'),
  };
}

// ═══════════════════════════════════════════════════════════════
// SEGMENT RECORD
// ═══════════════════════════════════════════════════════════════

export const SEGMENT_KEY_SEPARATOR = '_';

export const SegmentRecordSchema = z
  .object({
    timestamp: z.string().min(1),
    // The first separator in a segment key must split it back into group and region
    group: z
      .string()
      .trim()
      .min(1)
      .refine((g) => !g.includes(SEGMENT_KEY_SEPARATOR), {
        message: `must not contain '${SEGMENT_KEY_SEPARATOR}'`,
      }),
    region: z.string().trim().min(1),
    brand_percentages: z.record(z.string(), z.number().finite().min(0).max(100)),
    avg_satisfaction: z.number().finite().min(0).max(1),
  })
  .passthrough();

export type SegmentRecord = z.infer<typeof SegmentRecordSchema>;

export function segmentKey(group: string, region: string): string {
  return `${group}${SEGMENT_KEY_SEPARATOR}${region}`;
}

// ═══════════════════════════════════════════════════════════════
// RAW BATCH (what a record source hands over)
// ═══════════════════════════════════════════════════════════════

export interface RawRow {
  position: number; // 1-based: line number for JSONL, ordinal otherwise
  value: unknown;
}

export interface ParseError {
  position: number;
  reason: string;
}

export interface RawBatch {
  rows: RawRow[];
  parseErrors: ParseError[];
}

export function rawBatchOf(values: readonly unknown[]): RawBatch {
  return {
    rows: values.map((value, i) => ({ position: i + 1, value })),
    parseErrors: [],
  };
}
