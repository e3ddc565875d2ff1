/**
 * BEHAVIOR DATA: Filters & Summary
 */

import { round3 } from '../../common/math.js';
import { BRANDS, mapBrands } from './behavior.contract.js';
import type { Brand, BrandShares, SegmentRecord } from './behavior.contract.js';
import { matchesPersona, matchesRegion } from './persona.catalog.js';

export interface BehaviorFilter {
  persona?: string;
  region?: string;
  startDate?: string; // YYYY-MM-DD, inclusive
  endDate?: string;   // YYYY-MM-DD, inclusive
}

const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar day of a record, or null when the timestamp carries no usable date.
 */
export function recordDay(timestamp: string): string | null {
  const day = timestamp.slice(0, 10);
  if (!DAY_RE.test(day) || Number.isNaN(Date.parse(day))) return null;
  return day;
}

export function filterBehaviorRecords(
  records: readonly SegmentRecord[],
  filter: BehaviorFilter
): SegmentRecord[] {
  const { persona, region, startDate, endDate } = filter;

  return records.filter((r) => {
    if (persona && !matchesPersona(r.group, persona)) return false;
    if (region && !matchesRegion(r.region, region)) return false;

    if (startDate || endDate) {
      // Undated records are not excluded by a date range
      const day = recordDay(r.timestamp);
      if (day === null) return true;
      if (startDate && day < startDate) return false;
      if (endDate && day > endDate) return false;
    }
    return true;
  });
}

// ═══════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════

export interface BehaviorSummary {
  total_records: number;
  average_satisfaction: number;
  top_brand: Brand;
  brand_distribution_summary: BrandShares;
  persona_breakdown: Record<string, number>;
  region_breakdown: Record<string, number>;
}

function countBy(records: readonly SegmentRecord[], pick: (r: SegmentRecord) => string) {
  const counts: Record<string, number> = {};
  for (const r of records) {
    const k = pick(r);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function summarizeBehavior(records: readonly SegmentRecord[]): BehaviorSummary | null {
  const n = records.length;
  if (n === 0) return null;

  const satisfaction = records.reduce((s, r) => s + r.avg_satisfaction, 0) / n;
  const brandAvg = mapBrands(
    (brand) => records.reduce((s, r) => s + (r.brand_percentages[brand] ?? 0), 0) / n
  );

  // First brand wins a tie
  let topBrand: Brand = BRANDS[0];
  for (const brand of BRANDS) {
    if (brandAvg[brand] > brandAvg[topBrand]) topBrand = brand;
  }

  return {
    total_records: n,
    average_satisfaction: round3(satisfaction),
    top_brand: topBrand,
    brand_distribution_summary: brandAvg,
    persona_breakdown: countBy(records, (r) => r.group),
    region_breakdown: countBy(records, (r) => r.region),
  };
}
