import { describe, it, expect } from 'vitest';
import type { SegmentRecord } from '../behavior.contract.js';
import { filterBehaviorRecords, recordDay, summarizeBehavior } from '../behavior.filter.js';

function record(
  group: string,
  region: string,
  timestamp: string,
  shares: [number, number, number],
  satisfaction: number
): SegmentRecord {
  return {
    timestamp,
    group,
    region,
    brand_percentages: { '7-11': shares[0], FamilyMart: shares[1], Other: shares[2] },
    avg_satisfaction: satisfaction,
  };
}

const RECORDS: SegmentRecord[] = [
  record('新鮮人', '台北', '2026-01-31T23:00:00Z', [50, 30, 20], 0.7),
  record('FinTech家庭', '台南', '2026-02-28T23:00:00Z', [40, 40, 20], 0.8),
  record('新鮮人', '台南', 'unknown', [30, 45, 25], 0.6),
];

describe('Behavior filters', () => {
  it('should extract the calendar day of a timestamp', () => {
    expect(recordDay('2026-01-31T23:00:00Z')).toBe('2026-01-31');
    expect(recordDay('2026-02-28')).toBe('2026-02-28');
    expect(recordDay('unknown')).toBeNull();
  });

  it('should filter by persona alias and region', () => {
    const byPersona = filterBehaviorRecords(RECORDS, { persona: 'fresh_grad' });
    expect(byPersona.map((r) => r.region)).toEqual(['台北', '台南']);

    const both = filterBehaviorRecords(RECORDS, { persona: 'fresh_grad', region: 'tainan' });
    expect(both).toHaveLength(1);
    expect(both[0]?.timestamp).toBe('unknown');
  });

  it('should apply an inclusive date range and keep undated records', () => {
    const result = filterBehaviorRecords(RECORDS, {
      startDate: '2026-02-01',
      endDate: '2026-02-28',
    });

    expect(result.map((r) => r.group)).toEqual(['FinTech家庭', '新鮮人']);
  });

  it('should return everything for an empty filter', () => {
    expect(filterBehaviorRecords(RECORDS, {})).toHaveLength(3);
  });
});

describe('Behavior summary', () => {
  it('should return null for no records', () => {
    expect(summarizeBehavior([])).toBeNull();
  });

  it('should average satisfaction and brand shares', () => {
    const summary = summarizeBehavior(RECORDS.slice(0, 2));

    expect(summary).not.toBeNull();
    expect(summary?.total_records).toBe(2);
    expect(summary?.average_satisfaction).toBe(0.75);
    expect(summary?.top_brand).toBe('7-11');
    expect(summary?.brand_distribution_summary).toEqual({ '7-11': 45, FamilyMart: 35, Other: 20 });
    expect(summary?.persona_breakdown).toEqual({ '新鮮人': 1, 'FinTech家庭': 1 });
    expect(summary?.region_breakdown).toEqual({ '台北': 1, '台南': 1 });
  });

  it('should pick the highest average brand', () => {
    const summary = summarizeBehavior(RECORDS.slice(2));

    expect(summary?.top_brand).toBe('FamilyMart');
  });
});
