import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { corsOrigin } from './config/env.js';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { registerBehaviorRoutes } from './modules/behavior/index.js';
import type { BehaviorRecordSource, IntelSources } from './modules/behavior/index.js';
import { HealthService, registerHealthRoutes } from './modules/health/index.js';
import { WhatIfEngine, registerWhatIfRoutes } from './modules/whatif/index.js';

export interface AppDeps {
  env: Env;
  source: BehaviorRecordSource;
  intel: IntelSources;
  startedAt: Date;
  engine?: WhatIfEngine;
  logger?: boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { env, source, intel, startedAt } = deps;
  const engine = deps.engine ?? new WhatIfEngine({ modelVersion: env.MODEL_VERSION });

  const app = Fastify({
    logger: deps.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: corsOrigin(env),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) request.log.error(err);
      else request.log.warn({ code: err.code }, err.message);

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err.details !== undefined ? { details: err.details } : {}),
      });
    }

    // Fastify validation / body parsing errors
    if (err.validation || (err.statusCode !== undefined && err.statusCode < 500)) {
      request.log.warn(err.message);
      return reply.status(err.statusCode ?? 400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    request.log.error(err);
    return reply.status(500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/', async () => ({
    ok: true,
    name: 'What-If Impact Engine',
    version: env.MODEL_VERSION,
    endpoints: {
      health: '/api/health',
      metrics: '/api/v1/metrics',
      behavior: '/api/v1/behavior',
      simulation: '/api/v1/simulation',
    },
  }));

  app.register(async (fastify) => {
    await registerHealthRoutes(fastify, new HealthService(source, startedAt, env.MODEL_VERSION));
    await registerBehaviorRoutes(fastify, { source, intel });
    await registerWhatIfRoutes(fastify, { source, engine });
  });

  return app;
}
