/**
 * BEHAVIOR DATA: Ingest
 *
 * Turns a raw batch into validated Segment Records. Every row gets an
 * explicit outcome so that skip counts can be reported instead of lost:
 *
 *   KEPT      valid observation
 *   EXCLUDED  simulation artifact (has an "event" field)
 *   SKIPPED   failed validation, with the first failing field as reason
 *
 * Lines that were not valid JSON arrive as parseErrors and are reported as
 * SKIPPED at the PARSE stage.
 */

import { formatIssues } from '../../common/errors.js';
import { SegmentRecordSchema } from './behavior.contract.js';
import type { RawBatch, SegmentRecord } from './behavior.contract.js';

export type RecordOutcome =
  | { position: number; status: 'KEPT'; record: SegmentRecord }
  | { position: number; status: 'EXCLUDED'; reason: 'SIMULATION_ARTIFACT' }
  | { position: number; status: 'SKIPPED'; reason: string };

export interface SkippedRecord {
  position: number;
  stage: 'PARSE' | 'VALIDATION';
  reason: string;
}

export interface IngestReport {
  received: number;
  kept: number;
  excluded: number;
  skipped: SkippedRecord[];
}

export interface IngestResult {
  records: SegmentRecord[];
  report: IngestReport;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSimulationArtifact(value: unknown): boolean {
  return isPlainObject(value) && 'event' in value;
}

export function classifyRecord(value: unknown, position: number): RecordOutcome {
  if (isSimulationArtifact(value)) {
    return { position, status: 'EXCLUDED', reason: 'SIMULATION_ARTIFACT' };
  }

  const parsed = SegmentRecordSchema.safeParse(value);
  if (!parsed.success) {
    const [reason = 'invalid record'] = formatIssues(parsed.error.issues);
    return { position, status: 'SKIPPED', reason };
  }

  return { position, status: 'KEPT', record: parsed.data };
}

export function ingestRecords(batch: RawBatch): IngestResult {
  const records: SegmentRecord[] = [];
  const skipped: SkippedRecord[] = batch.parseErrors.map((e) => ({
    position: e.position,
    stage: 'PARSE',
    reason: e.reason,
  }));
  let excluded = 0;

  for (const row of batch.rows) {
    const outcome = classifyRecord(row.value, row.position);
    switch (outcome.status) {
      case 'KEPT':
        records.push(outcome.record);
        break;
      case 'EXCLUDED':
        excluded++;
        break;
      case 'SKIPPED':
        skipped.push({ position: outcome.position, stage: 'VALIDATION', reason: outcome.reason });
        break;
    }
  }

  skipped.sort((a, b) => a.position - b.position);

  return {
    records,
    report: {
      received: batch.rows.length + batch.parseErrors.length,
      kept: records.length,
      excluded,
      skipped,
    },
  };
}
