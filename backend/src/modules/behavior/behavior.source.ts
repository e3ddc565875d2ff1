/**
 * BEHAVIOR DATA: Record Sources
 *
 * A source hands over rows in ingest order; it never validates them.
 * Ingest order matters: the first record per segment becomes the baseline.
 *
 * The same sources feed the intel JSONL files, which have their own schemas.
 */

import { readFile } from 'fs/promises';
import type { RawBatch, RawRow, ParseError } from './behavior.contract.js';
import { rawBatchOf } from './behavior.contract.js';

export type RecordSourceKind = 'jsonl' | 'mongo' | 'memory';

export interface BehaviorRecordSource {
  readonly kind: RecordSourceKind;
  describe(): string;
  readAll(): Promise<RawBatch>;
}

export interface IntelSources {
  daily: BehaviorRecordSource;
  web: BehaviorRecordSource;
}

// ═══════════════════════════════════════════════════════════════
// JSONL
// ═══════════════════════════════════════════════════════════════

export function parseJsonl(text: string): RawBatch {
  const rows: RawRow[] = [];
  const parseErrors: ParseError[] = [];

  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;

    try {
      const value: unknown = JSON.parse(trimmed);
      rows.push({ position: i + 1, value });
    } catch (err) {
      parseErrors.push({
        position: i + 1,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return { rows, parseErrors };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonlBehaviorSource implements BehaviorRecordSource {
  public readonly kind = 'jsonl';

  constructor(private readonly filePath: string) {}

  describe(): string {
    return `jsonl:${this.filePath}`;
  }

  async readAll(): Promise<RawBatch> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        console.warn(`[Behavior] Data file not found: ${this.filePath}`);
        return { rows: [], parseErrors: [] };
      }
      throw err;
    }

    const batch = parseJsonl(text);
    if (batch.parseErrors.length > 0) {
      console.warn(
        `[Behavior] ${batch.parseErrors.length} unparseable line(s) in ${this.filePath}`
      );
    }
    return batch;
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryBehaviorSource implements BehaviorRecordSource {
  public readonly kind = 'memory';

  constructor(private readonly values: readonly unknown[] = []) {}

  describe(): string {
    return `memory:${this.values.length}`;
  }

  async readAll(): Promise<RawBatch> {
    return rawBatchOf(this.values);
  }
}
