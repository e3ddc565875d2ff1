/**
 * BEHAVIOR DATA: MongoDB Source & Cold Start
 *
 * COLD START: when the collection is empty on boot, seed it from the JSONL
 * file so the service works right after a fresh deployment.
 */

import { mongoose } from '../../db/mongoose.js';
import { BEHAVIOR_COLLECTION, BehaviorRecordModel } from './behavior.model.js';
import { rawBatchOf } from './behavior.contract.js';
import type { RawBatch } from './behavior.contract.js';
import { isPlainObject } from './behavior.ingest.js';
import type { BehaviorRecordSource } from './behavior.source.js';

export class MongoBehaviorSource implements BehaviorRecordSource {
  public readonly kind = 'mongo';

  describe(): string {
    return `mongo:${BEHAVIOR_COLLECTION}`;
  }

  async readAll(): Promise<RawBatch> {
    const docs = await BehaviorRecordModel
      .find({}, { _id: 0 })
      .sort({ _id: 1 })
      .lean()
      .exec();

    return rawBatchOf(docs);
  }

  async count(): Promise<number> {
    return BehaviorRecordModel.estimatedDocumentCount().exec();
  }
}

export async function coldStartBehaviorSeed(
  target: MongoBehaviorSource,
  seed: BehaviorRecordSource
): Promise<number> {
  const existing = await target.count();
  console.log(`[Cold Start] Behavior records in DB: ${existing}`);
  if (existing > 0) return 0;

  const batch = await seed.readAll();
  const docs = batch.rows.map((row) => row.value).filter(isPlainObject);

  if (docs.length === 0) {
    console.warn(`[Cold Start] No seed rows found at ${seed.describe()}`);
    return 0;
  }

  // Raw collection insert keeps every field and the original line order
  const result = await mongoose.connection
    .collection(BEHAVIOR_COLLECTION)
    .insertMany(docs, { ordered: true });

  console.log(`[Cold Start] Seeded ${result.insertedCount} behavior records from ${seed.describe()}`);
  return result.insertedCount;
}
