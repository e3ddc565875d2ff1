/**
 * HEALTH: Service
 *
 * Uptime is measured from the start time handed in at construction.
 * Process and host figures come through a SystemStats so tests can pin them.
 */

import os from 'os';
import { round2 } from '../../common/math.js';
import { ingestRecords } from '../behavior/behavior.ingest.js';
import type { BehaviorRecordSource, RecordSourceKind } from '../behavior/behavior.source.js';

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export interface UptimeInfo {
  seconds: number;
  formatted: string;
  days: number;
}

export interface HealthReport {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptime: UptimeInfo;
  source: {
    kind: RecordSourceKind;
    description: string;
    received: number;
    kept: number;
    excluded: number;
    skipped: number;
    error?: string;
  };
}

export interface ReadinessReport {
  ready: boolean;
  status: 'ready' | 'not_ready';
  message: string;
}

export interface SystemMetrics {
  timestamp: string;
  uptime_seconds: number;
  memory: {
    rss_mb: number;
    heap_used_mb: number;
    heap_total_mb: number;
    system_total_mb: number;
    system_free_mb: number;
    system_used_percent: number;
  };
  cpu: {
    user_ms: number;
    system_ms: number;
    process_percent: number;
    load_average: number[];
    cores: number;
  };
}

// ═══════════════════════════════════════════════════════════════
// SYSTEM STATS
// ═══════════════════════════════════════════════════════════════

export interface SystemStats {
  memoryUsage(): { rss: number; heapUsed: number; heapTotal: number };
  cpuUsage(): { user: number; system: number }; // microseconds
  totalmem(): number;
  freemem(): number;
  loadavg(): number[];
  cpuCount(): number;
}

export const nodeSystemStats: SystemStats = {
  memoryUsage: () => process.memoryUsage(),
  cpuUsage: () => process.cpuUsage(),
  totalmem: () => os.totalmem(),
  freemem: () => os.freemem(),
  loadavg: () => os.loadavg(),
  cpuCount: () => os.cpus().length,
};

const toMB = (bytes: number): number => round2(bytes / 1024 / 1024);

export function formatUptime(totalSeconds: number): UptimeInfo {
  const s = Math.max(0, totalSeconds);
  const days = Math.floor(s / 86400);
  const hours = Math.floor((s % 86400) / 3600);
  const minutes = Math.floor((s % 3600) / 60);
  const seconds = Math.floor(s % 60);

  return {
    seconds: round2(s),
    formatted: `${days}d ${hours}h ${minutes}m ${seconds}s`,
    days,
  };
}

export class HealthService {
  constructor(
    private readonly source: BehaviorRecordSource,
    private readonly startedAt: Date,
    private readonly version: string,
    private readonly clock: () => Date = () => new Date(),
    private readonly system: SystemStats = nodeSystemStats
  ) {}

  uptime(): UptimeInfo {
    return formatUptime((this.clock().getTime() - this.startedAt.getTime()) / 1000);
  }

  async check(): Promise<HealthReport> {
    const now = this.clock();
    const base = {
      version: this.version,
      timestamp: now.toISOString(),
      uptime: this.uptime(),
    };
    const sourceInfo = { kind: this.source.kind, description: this.source.describe() };

    try {
      const { report } = ingestRecords(await this.source.readAll());
      return {
        ...base,
        status: report.kept > 0 ? 'healthy' : 'degraded',
        source: {
          ...sourceInfo,
          received: report.received,
          kept: report.kept,
          excluded: report.excluded,
          skipped: report.skipped.length,
        },
      };
    } catch (err) {
      console.error('[Health] Record source check failed:', err);
      return {
        ...base,
        status: 'critical',
        source: {
          ...sourceInfo,
          received: 0,
          kept: 0,
          excluded: 0,
          skipped: 0,
          error: err instanceof Error ? err.message : String(err),
        },
      };
    }
  }

  async readiness(): Promise<ReadinessReport> {
    const report = await this.check();

    if (report.status === 'critical') {
      return { ready: false, status: 'not_ready', message: report.source.error ?? 'Record source unavailable' };
    }
    if (report.status === 'degraded') {
      return { ready: false, status: 'not_ready', message: 'No behavior records available' };
    }
    return { ready: true, status: 'ready', message: 'Service is ready' };
  }

  metrics(): SystemMetrics {
    const uptime = this.uptime();
    const mem = this.system.memoryUsage();
    const cpu = this.system.cpuUsage();
    const total = this.system.totalmem();
    const free = this.system.freemem();

    const cpuMs = (cpu.user + cpu.system) / 1000;
    const wallMs = uptime.seconds * 1000;

    return {
      timestamp: this.clock().toISOString(),
      uptime_seconds: uptime.seconds,
      memory: {
        rss_mb: toMB(mem.rss),
        heap_used_mb: toMB(mem.heapUsed),
        heap_total_mb: toMB(mem.heapTotal),
        system_total_mb: toMB(total),
        system_free_mb: toMB(free),
        system_used_percent: total > 0 ? round2(((total - free) / total) * 100) : 0,
      },
      cpu: {
        user_ms: round2(cpu.user / 1000),
        system_ms: round2(cpu.system / 1000),
        process_percent: wallMs > 0 ? round2((cpuMs / wallMs) * 100) : 0,
        load_average: this.system.loadavg().map(round2),
        cores: this.system.cpuCount(),
      },
    };
  }
}
