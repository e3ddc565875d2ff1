/**
 * WHAT-IF ENGINE: Baseline Resolver
 *
 * One baseline per persona/region segment: the FIRST valid, non-artifact
 * record for that key in ingest order. Later records for the same key are
 * ignored, so the baseline is the earliest observation, not the latest.
 *
 * An empty result is not an error here; the caller decides.
 */

import { mapBrands, segmentKey } from '../behavior/behavior.contract.js';
import type { BrandShares, RawBatch, SegmentRecord } from '../behavior/behavior.contract.js';
import { ingestRecords } from '../behavior/behavior.ingest.js';
import type { IngestReport } from '../behavior/behavior.ingest.js';
import type { BaselineEntry } from './whatif.contract.js';

export interface BaselineResolution {
  baselines: Map<string, BaselineEntry>;
  report: IngestReport;
}

/**
 * Tracked brands only; a brand missing from the record counts as 0.
 */
export function toBrandShares(percentages: Readonly<Record<string, number>>): BrandShares {
  return mapBrands((brand) => percentages[brand] ?? 0);
}

export function toBaselineEntry(record: SegmentRecord): BaselineEntry {
  return {
    key: segmentKey(record.group, record.region),
    group: record.group,
    region: record.region,
    brandPercentages: toBrandShares(record.brand_percentages),
    avgSatisfaction: record.avg_satisfaction,
    timestamp: record.timestamp,
  };
}

export function resolveBaselines(batch: RawBatch): BaselineResolution {
  const { records, report } = ingestRecords(batch);
  const baselines = new Map<string, BaselineEntry>();

  for (const record of records) {
    const entry = toBaselineEntry(record);
    if (!baselines.has(entry.key)) {
      baselines.set(entry.key, entry);
    }
  }

  return { baselines, report };
}
