/**
 * Behavior ingest & record source tests
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import { rawBatchOf } from '../behavior.contract.js';
import { classifyRecord, ingestRecords, isSimulationArtifact } from '../behavior.ingest.js';
import { InMemoryBehaviorSource, JsonlBehaviorSource, parseJsonl } from '../behavior.source.js';

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

const validRecord = {
  timestamp: '2026-01-31T23:00:00Z',
  group: '新鮮人',
  region: '台北',
  brand_percentages: { '7-11': 50, FamilyMart: 30, Other: 20 },
  avg_satisfaction: 0.7,
};

describe('Behavior ingest', () => {
  describe('classifyRecord', () => {
    it('should keep a valid record and preserve extra fields', () => {
      const outcome = classifyRecord({ ...validRecord, total_personas: 12 }, 1);

      expect(outcome.status).toBe('KEPT');
      if (outcome.status === 'KEPT') {
        expect(outcome.record.group).toBe('新鮮人');
        expect(outcome.record.total_personas).toBe(12);
      }
    });

    it('should exclude records carrying an event field', () => {
      const outcome = classifyRecord({ ...validRecord, event: 'promotion' }, 3);

      expect(outcome).toEqual({ position: 3, status: 'EXCLUDED', reason: 'SIMULATION_ARTIFACT' });
    });

    it('should skip a record with a missing group', () => {
      const { group: _group, ...noGroup } = validRecord;
      const outcome = classifyRecord(noGroup, 2);

      expect(outcome).toEqual({ position: 2, status: 'SKIPPED', reason: 'group: Required' });
    });

    it('should skip a record with out-of-range satisfaction', () => {
      const outcome = classifyRecord({ ...validRecord, avg_satisfaction: 1.5 }, 4);

      expect(outcome).toEqual({
        position: 4,
        status: 'SKIPPED',
        reason: 'avg_satisfaction: Number must be less than or equal to 1',
      });
    });

    it('should skip values that are not objects', () => {
      expect(classifyRecord('hello', 1).status).toBe('SKIPPED');
      expect(classifyRecord(null, 1).status).toBe('SKIPPED');
      expect(isSimulationArtifact(['event'])).toBe(false);
    });
  });

  describe('ingestRecords', () => {
    it('should count every row exactly once', () => {
      const batch = rawBatchOf([validRecord, { ...validRecord, event: 'external' }, { foo: 1 }]);
      batch.parseErrors.push({ position: 9, reason: 'Unexpected token' });

      const { records, report } = ingestRecords(batch);

      expect(records).toHaveLength(1);
      expect(report.received).toBe(4);
      expect(report.kept).toBe(1);
      expect(report.excluded).toBe(1);
      expect(report.skipped.map((s) => [s.position, s.stage])).toEqual([
        [3, 'VALIDATION'],
        [9, 'PARSE'],
      ]);
    });

    it('should return an empty report for an empty batch', () => {
      const { records, report } = ingestRecords(rawBatchOf([]));

      expect(records).toEqual([]);
      expect(report).toEqual({ received: 0, kept: 0, excluded: 0, skipped: [] });
    });
  });
});

describe('Behavior record sources', () => {
  describe('parseJsonl', () => {
    it('should skip blank lines and keep 1-based line numbers', () => {
      const batch = parseJsonl('{"a":1}\n\n   \r\n{"b":2}\r\n');

      expect(batch.rows).toEqual([
        { position: 1, value: { a: 1 } },
        { position: 4, value: { b: 2 } },
      ]);
      expect(batch.parseErrors).toEqual([]);
    });

    it('should report unparseable lines without aborting', () => {
      const batch = parseJsonl('{"a":1}\n{broken\n{"c":3}');

      expect(batch.rows.map((r) => r.position)).toEqual([1, 3]);
      expect(batch.parseErrors).toHaveLength(1);
      expect(batch.parseErrors[0]?.position).toBe(2);
    });
  });

  describe('JsonlBehaviorSource', () => {
    it('should read the fixture file in line order', async () => {
      const source = new JsonlBehaviorSource(path.join(FIXTURES, 'behavior_sample.jsonl'));
      const { records, report } = ingestRecords(await source.readAll());

      expect(records.map((r) => r.group)).toEqual(['新鮮人', 'FinTech家庭']);
      expect(report.received).toBe(5);
      expect(report.kept).toBe(2);
      expect(report.excluded).toBe(1);
      expect(report.skipped).toEqual([
        expect.objectContaining({ position: 5, stage: 'PARSE' }),
        {
          position: 6,
          stage: 'VALIDATION',
          reason: 'avg_satisfaction: Number must be less than or equal to 1',
        },
      ]);
    });

    it('should return an empty batch when the file is missing', async () => {
      const source = new JsonlBehaviorSource(path.join(FIXTURES, 'does_not_exist.jsonl'));

      expect(await source.readAll()).toEqual({ rows: [], parseErrors: [] });
    });

    it('should describe itself by path', () => {
      expect(new JsonlBehaviorSource('/data/x.jsonl').describe()).toBe('jsonl:/data/x.jsonl');
    });
  });

  describe('InMemoryBehaviorSource', () => {
    it('should hand over values with ordinal positions', async () => {
      const source = new InMemoryBehaviorSource([validRecord, { event: 'x' }]);
      const batch = await source.readAll();

      expect(batch.rows.map((r) => r.position)).toEqual([1, 2]);
      expect(source.kind).toBe('memory');
    });
  });
});
