/**
 * BEHAVIOR DATA MODULE
 *
 * Segment Records from a JSONL file or the behavior_twin_monthly collection.
 *
 * Exports:
 * - Record contract & ingest
 * - Record sources (jsonl / mongo / memory)
 * - Daily & web intel readers
 * - Persona & region catalog
 * - Routes registration
 */

import path from 'path';
import type { Env } from '../../config/env.js';
import { connectMongo } from '../../db/mongoose.js';
import { MongoBehaviorSource, coldStartBehaviorSeed } from './behavior.mongo.js';
import { JsonlBehaviorSource } from './behavior.source.js';
import type { BehaviorRecordSource, IntelSources } from './behavior.source.js';

export * from './behavior.contract.js';
export * from './behavior.ingest.js';
export * from './behavior.source.js';
export * from './behavior.filter.js';
export * from './intel.contract.js';
export * from './intel.service.js';
export * from './persona.catalog.js';
export { MongoBehaviorSource, coldStartBehaviorSeed } from './behavior.mongo.js';
export { registerBehaviorRoutes } from './behavior.routes.js';

export async function createRecordSource(
  env: Pick<Env, 'DATA_PATH' | 'BEHAVIOR_FILE' | 'RECORD_SOURCE' | 'MONGO_URL'>
): Promise<BehaviorRecordSource> {
  const jsonl = new JsonlBehaviorSource(path.resolve(env.DATA_PATH, env.BEHAVIOR_FILE));

  if (env.RECORD_SOURCE === 'jsonl') {
    console.log(`[Behavior] Record source: ${jsonl.describe()}`);
    return jsonl;
  }

  await connectMongo(env.MONGO_URL);
  const mongo = new MongoBehaviorSource();
  await coldStartBehaviorSeed(mongo, jsonl);
  console.log(`[Behavior] Record source: ${mongo.describe()}`);
  return mongo;
}

export function createIntelSources(
  env: Pick<Env, 'DATA_PATH' | 'DAILY_INTEL_FILE' | 'WEB_INTEL_PATH' | 'WEB_INTEL_FILE'>
): IntelSources {
  return {
    daily: new JsonlBehaviorSource(path.resolve(env.DATA_PATH, env.DAILY_INTEL_FILE)),
    web: new JsonlBehaviorSource(path.resolve(env.WEB_INTEL_PATH, env.WEB_INTEL_FILE)),
  };
}
