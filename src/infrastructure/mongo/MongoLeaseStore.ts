import { MongoClient, MongoServerError, type Collection } from "mongodb";
import { compareCheckpoints, type Lease } from "../../core/lease/Lease";
import { LeaseStoreUnavailableError } from "../../core/lease/lease.errors";
import type {
  AcquireLeaseParams,
  AcquireLeaseResult,
  CheckpointWriteResult,
  LeaseStore
} from "../../ports/LeaseStore";
import { classifyMongoFailure, NAMESPACE_NOT_FOUND } from "./mongo.errors";
import { mongoIndexes } from "./mongo.indexes";

export type LeaseDoc = {
  _id: string; // shard id
  owner: string | null;
  expiresAt: Date | null;
  checkpoint: string | null;
  counter: number;
  parentIds: string[];
  updatedAt: Date;
};

const DUPLICATE_KEY = 11000;

const unavailableOrRethrow = (operation: string, err: unknown): never => {
  if (classifyMongoFailure(err) === "throttled") throw new LeaseStoreUnavailableError(operation, err);
  throw err;
};

export const toLease = (doc: LeaseDoc): Lease => ({
  shardId: doc._id,
  owner: doc.owner,
  expiresAt: doc.expiresAt,
  checkpoint: doc.checkpoint,
  counter: doc.counter,
  parentIds: doc.parentIds
});

/**
 * Lease table in one Mongo collection (named after the application).
 * Ownership changes go through findOneAndUpdate filtered on the expected counter,
 * so of two concurrent writers with the same counter exactly one matches.
 */
export class MongoLeaseStore implements LeaseStore {
  private client?: MongoClient;
  private collection?: Collection<LeaseDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly collectionName: string,
    private readonly dbName?: string
  ) {}

  private async getCollection(): Promise<Collection<LeaseDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const db = this.client.db(this.dbName);
    const col = db.collection<LeaseDoc>(this.collectionName);

    for (const idx of mongoIndexes.leaseCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async readLease(shardId: string): Promise<Lease | null> {
    try {
      const col = await this.getCollection();
      const doc = await col.findOne({ _id: shardId });
      return doc ? toLease(doc) : null;
    } catch (err) {
      return unavailableOrRethrow("readLease", err);
    }
  }

  async listLeases(): Promise<Lease[]> {
    try {
      const col = await this.getCollection();
      const docs = await col.find({}).toArray();
      return docs.map(toLease);
    } catch (err) {
      return unavailableOrRethrow("listLeases", err);
    }
  }

  async createLeaseIfAbsent(shard: { shardId: string; parentIds: string[] }): Promise<void> {
    try {
      const col = await this.getCollection();
      await col.updateOne(
        { _id: shard.shardId },
        {
          $setOnInsert: {
            owner: null,
            expiresAt: null,
            checkpoint: null,
            counter: 0,
            parentIds: shard.parentIds,
            updatedAt: new Date()
          }
        },
        { upsert: true }
      );
    } catch (err) {
      // Another worker inserted the row first.
      if (err instanceof MongoServerError && err.code === DUPLICATE_KEY) return;
      unavailableOrRethrow("createLeaseIfAbsent", err);
    }
  }

  async acquireOrRenew(params: AcquireLeaseParams): Promise<AcquireLeaseResult> {
    const { shardId, workerId, expectedCounter, ttlMs, now } = params;
    try {
      const col = await this.getCollection();
      const doc = await col.findOneAndUpdate(
        {
          _id: shardId,
          counter: expectedCounter,
          $or: [{ owner: null }, { owner: workerId }, { expiresAt: { $lte: now } }]
        },
        {
          $set: { owner: workerId, expiresAt: new Date(now.getTime() + ttlMs), updatedAt: now },
          $inc: { counter: 1 }
        },
        { returnDocument: "after" }
      );
      return doc ? { status: "acquired", lease: toLease(doc) } : { status: "conflict" };
    } catch (err) {
      if (classifyMongoFailure(err) === "throttled") return { status: "throttled", error: err };
      throw err;
    }
  }

  async releaseLease(shardId: string, workerId: string, counter: number): Promise<boolean> {
    try {
      const col = await this.getCollection();
      const res = await col.updateOne(
        { _id: shardId, counter, owner: workerId },
        { $set: { owner: null, expiresAt: null, updatedAt: new Date() }, $inc: { counter: 1 } }
      );
      return res.modifiedCount === 1;
    } catch (err) {
      return unavailableOrRethrow("releaseLease", err);
    }
  }

  async writeCheckpoint(shardId: string, counter: number, checkpoint: string): Promise<CheckpointWriteResult> {
    try {
      const col = await this.getCollection();
      const current = await col.findOne({ _id: shardId });
      if (!current || current.counter !== counter) {
        return { status: "conflict" };
      }
      if (current.checkpoint != null && compareCheckpoints(checkpoint, current.checkpoint) < 0) {
        return { status: "ok", applied: false };
      }

      const res = await col.updateOne(
        { _id: shardId, counter, checkpoint: current.checkpoint },
        { $set: { checkpoint, updatedAt: new Date() } }
      );
      return res.matchedCount === 1 ? { status: "ok", applied: true } : { status: "conflict" };
    } catch (err) {
      const failure = classifyMongoFailure(err);
      if (failure === "throttled") return { status: "throttled", error: err };
      if (failure === "schema_error") return { status: "schema_error", error: err };
      throw err;
    }
  }

  async drop(): Promise<void> {
    const col = await this.getCollection();
    try {
      await col.drop();
    } catch (err) {
      if (err instanceof MongoServerError && err.code === NAMESPACE_NOT_FOUND) return;
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
