/**
 * HEALTH: Routes
 *
 * ROUTES:
 * - GET /api/health       - Status, uptime and record source counts
 * - GET /api/health/live  - Liveness check
 * - GET /api/health/ready - Readiness (503 until behavior records are readable)
 * - GET /api/v1/metrics    - Process memory & CPU
 */

import type { FastifyInstance } from 'fastify';
import type { HealthService } from './health.service.js';

export async function registerHealthRoutes(
  app: FastifyInstance,
  health: HealthService
): Promise<void> {
  app.get('/api/health', async (_request, reply) => {
    const report = await health.check();
    const ok = report.status !== 'critical';
    return reply.status(ok ? 200 : 503).send({ ok, ...report });
  });

  app.get('/api/health/live', async () => ({
    status: 'alive',
    timestamp: new Date().toISOString(),
  }));

  app.get('/api/health/ready', async (_request, reply) => {
    const { ready, status, message } = await health.readiness();
    return reply.status(ready ? 200 : 503).send({ ok: ready, status, message });
  });

  app.get('/api/v1/metrics', async () => ({ ok: true, ...health.metrics() }));
}
