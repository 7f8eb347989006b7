import { SHARD_END_CHECKPOINT, type Lease } from "../../core/lease/Lease";
import { LeaseStoreUnavailableError } from "../../core/lease/lease.errors";
import { isRetryableStreamError } from "../../core/stream/stream.errors";
import type { StreamPosition } from "../../core/stream/stream.types";
import type { CheckpointWriteResult, LeaseStore } from "../../ports/LeaseStore";
import type { Checkpointer, RecordProcessor, ShutdownReason } from "../../ports/RecordProcessor";
import type { RecordBatch, StreamSource } from "../../ports/StreamSource";
import { sleep as defaultSleep, type Sleep } from "../../shared/concurrency/sleep";
import type { ConsumerConfig } from "./consumer.config";
import { classifyWorkerFailure, toErrorMessage } from "./consume.error-handler";

export type ShardWorkerState = "ACQUIRING" | "PROCESSING" | "DRAINING" | "LEASE_LOST" | "SHUTDOWN";

export type ShardWorkerOutcome = "not_acquired" | ShutdownReason | "fatal" | "failed";

export type ShardWorkerDeps = {
  streamName: string;
  workerId: string;
  lease: Lease;
  source: StreamSource;
  leaseStore: LeaseStore;
  processor: RecordProcessor;
  config: Pick<ConsumerConfig, "initialPosition" | "leaseTtlMs" | "maxRecords" | "idleTimeBetweenReadsMs">;
  signal: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
};

/**
 * Checkpointer bound to one shard lease. Writes carry the worker's current lease
 * counter so the store rejects them once the lease has moved on.
 */
export class LeaseCheckpointer implements Checkpointer {
  private lastDelivered: string | null = null;
  private shardEnded = false;

  constructor(
    private readonly leaseStore: LeaseStore,
    private readonly shardId: string,
    private readonly currentCounter: () => number
  ) {}

  delivered(sequenceNumber: string): void {
    this.lastDelivered = sequenceNumber;
  }

  markShardEnded(): void {
    this.shardEnded = true;
  }

  lastDeliveredSequenceNumber(): string | null {
    return this.lastDelivered;
  }

  async checkpoint(sequenceNumber?: string): Promise<CheckpointWriteResult> {
    const value = this.shardEnded ? SHARD_END_CHECKPOINT : sequenceNumber ?? this.lastDelivered;
    if (value == null) {
      return { status: "ok", applied: false };
    }
    return this.leaseStore.writeCheckpoint(this.shardId, this.currentCounter(), value);
  }
}

/**
 * Owns one shard lease for its lifetime:
 * ACQUIRING -> PROCESSING -> DRAINING -> SHUTDOWN, or PROCESSING -> LEASE_LOST -> SHUTDOWN.
 */
export class ShardWorker {
  private currentState: ShardWorkerState = "ACQUIRING";
  private counter: number;
  private readonly checkpointer: LeaseCheckpointer;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly deps: ShardWorkerDeps) {
    this.counter = deps.lease.counter;
    this.checkpointer = new LeaseCheckpointer(deps.leaseStore, deps.lease.shardId, () => this.counter);
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get shardId(): string {
    return this.deps.lease.shardId;
  }

  get state(): ShardWorkerState {
    return this.currentState;
  }

  /** Never rejects: failures are logged and reported as the outcome. */
  async run(): Promise<ShardWorkerOutcome> {
    try {
      return await this.runStates();
    } catch (err) {
      const decision = classifyWorkerFailure(err, { shardId: this.shardId });
      console.error(JSON.stringify(decision.log));
      return decision.outcome;
    } finally {
      this.currentState = "SHUTDOWN";
    }
  }

  private async runStates(): Promise<ShardWorkerOutcome> {
    const { source, processor, signal, streamName, config } = this.deps;

    if (!(await this.acquire())) {
      return "not_acquired";
    }

    this.currentState = "PROCESSING";
    processor.initialize({ shardId: this.shardId, signal });
    let position = this.startingPosition();

    while (true) {
      if (signal.aborted) return this.shutdown("requested");

      const renewed = await this.renew();
      if (renewed === "lost") {
        this.currentState = "LEASE_LOST";
        return this.shutdown("lease_lost");
      }
      if (renewed === "throttled") {
        await this.sleep(config.idleTimeBetweenReadsMs, signal);
        continue;
      }

      let batch: RecordBatch;
      try {
        batch = await source.getRecords({
          streamName,
          shardId: this.shardId,
          position,
          limit: config.maxRecords
        });
      } catch (err) {
        if (!isRetryableStreamError(err)) throw err;
        console.warn(JSON.stringify({ event: "shard.read_retry", shardId: this.shardId, reason: toErrorMessage(err) }));
        await this.sleep(config.idleTimeBetweenReadsMs, signal);
        continue;
      }

      if (batch.shardExhausted) {
        this.currentState = "DRAINING";
      }

      const last = batch.records[batch.records.length - 1];
      if (last) {
        this.checkpointer.delivered(last.sequenceNumber);
        await processor.process(batch.records, this.checkpointer);
      }
      position = batch.nextPosition;

      if (signal.aborted) return this.shutdown("requested");

      if (this.currentState === "DRAINING") {
        this.checkpointer.markShardEnded();
        return this.shutdown("terminated");
      }

      if (!last) {
        await this.sleep(config.idleTimeBetweenReadsMs, signal);
      }
    }
  }

  private startingPosition(): StreamPosition {
    const { lease, config } = this.deps;
    if (lease.checkpoint != null && lease.checkpoint !== SHARD_END_CHECKPOINT) {
      return { kind: "after", sequenceNumber: lease.checkpoint };
    }
    // Children of a split/merge start at their first record: the parents were read to the end.
    if (lease.parentIds.length > 0) {
      return { kind: "initial", position: "TRIM_HORIZON" };
    }
    return { kind: "initial", position: config.initialPosition };
  }

  private async acquire(): Promise<boolean> {
    const { leaseStore, workerId, config } = this.deps;
    const result = await leaseStore.acquireOrRenew({
      shardId: this.shardId,
      workerId,
      expectedCounter: this.counter,
      ttlMs: config.leaseTtlMs,
      now: this.now()
    });

    if (result.status !== "acquired") {
      console.log(JSON.stringify({ event: "shard.acquire_failed", shardId: this.shardId, reason: result.status }));
      return false;
    }

    this.counter = result.lease.counter;
    console.log(JSON.stringify({
      event: "shard.acquired",
      shardId: this.shardId,
      workerId,
      counter: this.counter,
      checkpoint: result.lease.checkpoint
    }));
    return true;
  }

  private async renew(): Promise<"renewed" | "lost" | "throttled"> {
    const { leaseStore, workerId, config } = this.deps;
    const result = await leaseStore.acquireOrRenew({
      shardId: this.shardId,
      workerId,
      expectedCounter: this.counter,
      ttlMs: config.leaseTtlMs,
      now: this.now()
    });

    switch (result.status) {
      case "acquired":
        this.counter = result.lease.counter;
        return "renewed";
      case "throttled":
        console.warn(JSON.stringify({ event: "shard.renew_throttled", shardId: this.shardId }));
        return "throttled";
      case "conflict":
        console.warn(JSON.stringify({ event: "shard.lease_lost", shardId: this.shardId, counter: this.counter }));
        return "lost";
    }
  }

  private async shutdown(reason: ShutdownReason): Promise<ShardWorkerOutcome> {
    const { processor, leaseStore, workerId } = this.deps;
    await processor.shutdown(reason, this.checkpointer);

    if (reason !== "lease_lost") {
      let released: boolean;
      let failure: string | undefined;
      try {
        released = await leaseStore.releaseLease(this.shardId, workerId, this.counter);
      } catch (err) {
        // Left to expire; progress is already stored.
        if (!(err instanceof LeaseStoreUnavailableError)) throw err;
        released = false;
        failure = toErrorMessage(err);
      }
      if (!released) {
        console.warn(JSON.stringify({
          event: "shard.release_skipped",
          shardId: this.shardId,
          counter: this.counter,
          reason: failure
        }));
      }
    }

    console.log(JSON.stringify({ event: "shard.shutdown", shardId: this.shardId, reason }));
    return reason;
  }
}
