import { MongoClient, MongoServerError, type Collection } from "mongodb";
import type { AdvanceWatermarkInput, Watermark, WatermarkStore } from "../../ports/WatermarkStore";
import { toErrorMessage, WatermarkConflictError, WriteError } from "../../core/ingestion/errors";
import { mongoIndexes } from "./mongo.indexes";

export type WatermarkDoc = {
  _id: string; // entity
  windowEnd: Date;
  batchPath: string;
  invocationId: string;
  updatedAt: Date;
  version: number;
};

const DUPLICATE_KEY = 11000;

export const toWatermark = (doc: WatermarkDoc): Watermark => ({
  entity: doc._id,
  windowEnd: doc.windowEnd,
  batchPath: doc.batchPath,
  invocationId: doc.invocationId,
  updatedAt: doc.updatedAt,
  revision: String(doc.version)
});

/**
 * Watermarks as versioned documents. `version` is bumped on every advance and
 * the update filter pins the version read before landing.
 */
export class MongoWatermarkStore implements WatermarkStore {
  private client?: MongoClient;
  private collection?: Collection<WatermarkDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "artist_pulse",
    private readonly collectionName = "watermarks",
    private readonly now: () => Date = () => new Date()
  ) {}

  private async getCollection(): Promise<Collection<WatermarkDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<WatermarkDoc>(this.collectionName);
    for (const idx of mongoIndexes.watermarkCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async read(entity: string): Promise<Watermark | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: entity });
    return doc ? toWatermark(doc) : null;
  }

  async advance(input: AdvanceWatermarkInput): Promise<Watermark> {
    const col = await this.getCollection();
    const updatedAt = this.now();

    if (input.expectedRevision === null) {
      const doc: WatermarkDoc = {
        _id: input.entity,
        windowEnd: input.windowEnd,
        batchPath: input.batchPath,
        invocationId: input.invocationId,
        updatedAt,
        version: 1
      };
      try {
        await col.insertOne(doc);
      } catch (err) {
        if (err instanceof MongoServerError && err.code === DUPLICATE_KEY) {
          throw new WatermarkConflictError(`Watermark for ${input.entity} was created concurrently`, { cause: err });
        }
        throw new WriteError(`Watermark insert for ${input.entity} failed: ${toErrorMessage(err)}`, { cause: err });
      }
      return toWatermark(doc);
    }

    const expectedVersion = Number(input.expectedRevision);
    if (!Number.isSafeInteger(expectedVersion)) {
      throw new WatermarkConflictError(`Watermark revision ${input.expectedRevision} is not a version number`);
    }

    let updated: WatermarkDoc | null;
    try {
      updated = await col.findOneAndUpdate(
        { _id: input.entity, version: expectedVersion, windowEnd: { $lt: input.windowEnd } },
        {
          $set: {
            windowEnd: input.windowEnd,
            batchPath: input.batchPath,
            invocationId: input.invocationId,
            updatedAt
          },
          $inc: { version: 1 }
        },
        { returnDocument: "after" }
      );
    } catch (err) {
      throw new WriteError(`Watermark update for ${input.entity} failed: ${toErrorMessage(err)}`, { cause: err });
    }

    if (!updated) {
      throw new WatermarkConflictError(
        `Watermark for ${input.entity} is no longer at version ${expectedVersion} or already past ${input.windowEnd.toISOString()}`
      );
    }
    return toWatermark(updated);
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
