/**
 * BEHAVIOR DATA: MongoDB Model
 *
 * Collection: behavior_twin_monthly
 *
 * Documents mirror the JSONL lines one-to-one; the schema is non-strict so
 * that extra snapshot fields survive a round trip. Insertion order (_id) is
 * the ingest order.
 */

import mongoose, { Schema } from 'mongoose';

export const BEHAVIOR_COLLECTION = 'behavior_twin_monthly';

const BehaviorRecordSchema = new Schema(
  {
    timestamp: { type: String },
    group: { type: String, index: true },
    region: { type: String, index: true },
    brand_percentages: { type: Schema.Types.Mixed },
    avg_satisfaction: { type: Number },
  },
  {
    collection: BEHAVIOR_COLLECTION,
    strict: false,
    versionKey: false,
    timestamps: false,
  }
);

BehaviorRecordSchema.index({ group: 1, region: 1 });

export const BehaviorRecordModel = mongoose.model('BehaviorRecord', BehaviorRecordSchema);
