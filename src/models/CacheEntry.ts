import mongoose, { Schema, Document, Types } from 'mongoose';

/**
 * Persistent cache entries for destination discovery and flight searches,
 * one document per namespace/key pair. Validity is decided by the caller;
 * `expiresAt` only lets MongoDB reap documents nobody will read again.
 */
export interface ICacheEntry extends Document {
  _id: Types.ObjectId;
  namespace: string;
  key: string;
  value: unknown;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

const cacheEntrySchema = new Schema<ICacheEntry>(
  {
    namespace: { type: String, required: true },
    key: { type: String, required: true },
    value: { type: Schema.Types.Mixed, required: true },
    expiresAt: { type: Date, required: true },
  },
  { timestamps: true },
);

cacheEntrySchema.index({ namespace: 1, key: 1 }, { unique: true });
cacheEntrySchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const CacheEntry = mongoose.model<ICacheEntry>('CacheEntry', cacheEntrySchema);
