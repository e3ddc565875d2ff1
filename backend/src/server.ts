/**
 * Server entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { disconnectMongo } from './db/mongoose.js';
import { createIntelSources, createRecordSource } from './modules/behavior/index.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const startedAt = new Date();

  console.log(`[BOOT] Starting What-If Impact Engine v${env.MODEL_VERSION} (${env.NODE_ENV})`);
  const source = await createRecordSource(env);
  const app = buildApp({ env, source, intel: createIntelSources(env), startedAt });

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info(`[BOOT] ${signal} received, shutting down`);
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error('[BOOT] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ host: env.API_HOST, port: env.API_PORT });
}

main().catch((err: unknown) => {
  console.error('[BOOT] Fatal:', err);
  process.exit(1);
});
