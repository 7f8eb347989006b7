import { randomUUID } from "crypto";
import { hostname } from "os";
import { compareSequenceNumbers } from "../stream/stream.types";

/**
 * Checkpoint written once a closed shard has been fully processed.
 * Sorts above every sequence number.
 */
export const SHARD_END_CHECKPOINT = "SHARD_END";

export type Lease = {
  shardId: string;
  owner: string | null;
  expiresAt: Date | null;
  checkpoint: string | null; // null = no progress yet
  counter: number;
  parentIds: string[];
};

export const isShardEnded = (lease: Pick<Lease, "checkpoint">): boolean =>
  lease.checkpoint === SHARD_END_CHECKPOINT;

export const isLeaseExpired = (lease: Pick<Lease, "expiresAt">, now: Date): boolean =>
  lease.expiresAt == null || lease.expiresAt.getTime() <= now.getTime();

/**
 * A lease can be taken by `workerId` when nobody holds it, the holder let it
 * expire, or it is a row left behind by an earlier run of the same worker.
 */
export const isLeaseAvailableTo = (lease: Lease, workerId: string, now: Date): boolean =>
  lease.owner == null || lease.owner === workerId || isLeaseExpired(lease, now);

export const compareCheckpoints = (left: string, right: string): number => {
  if (left === right) return 0;
  if (left === SHARD_END_CHECKPOINT) return 1;
  if (right === SHARD_END_CHECKPOINT) return -1;
  return compareSequenceNumbers(left, right);
};

export const createWorkerId = (host: string = hostname(), token: string = randomUUID()): string =>
  `${host}:${token}`;
