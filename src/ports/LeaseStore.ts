import type { Lease } from "../core/lease/Lease";

export type AcquireLeaseParams = {
  shardId: string;
  workerId: string;
  expectedCounter: number;
  ttlMs: number;
  now: Date;
};

export type AcquireLeaseResult =
  | { status: "acquired"; lease: Lease }
  | { status: "conflict" }
  | { status: "throttled"; error: unknown };

export type CheckpointWriteResult =
  | { status: "ok"; applied: boolean } // applied=false: value was below the stored checkpoint
  | { status: "conflict" }
  | { status: "throttled"; error: unknown }
  | { status: "schema_error"; error: unknown };

/**
 * Durable lease table. Every mutation is conditional on the lease counter.
 * Reads, row creation and release reject with LeaseStoreUnavailableError when the
 * table is temporarily unreachable; acquire and checkpoint report it as `throttled`.
 */
export interface LeaseStore {
  readLease(shardId: string): Promise<Lease | null>;
  listLeases(): Promise<Lease[]>;
  createLeaseIfAbsent(shard: { shardId: string; parentIds: string[] }): Promise<void>;
  acquireOrRenew(params: AcquireLeaseParams): Promise<AcquireLeaseResult>;
  releaseLease(shardId: string, workerId: string, counter: number): Promise<boolean>;
  writeCheckpoint(shardId: string, counter: number, checkpoint: string): Promise<CheckpointWriteResult>;
  drop(): Promise<void>;
}
