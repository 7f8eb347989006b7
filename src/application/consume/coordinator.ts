import { isLeaseAvailableTo, isShardEnded, type Lease } from "../../core/lease/Lease";
import { LeaseStoreUnavailableError } from "../../core/lease/lease.errors";
import { isRetryableStreamError } from "../../core/stream/stream.errors";
import type { ShardDescriptor } from "../../core/stream/stream.types";
import type { LeaseStore } from "../../ports/LeaseStore";
import type { RecordProcessorFactory } from "../../ports/RecordProcessor";
import type { StreamSource } from "../../ports/StreamSource";
import { sleep as defaultSleep, type Sleep } from "../../shared/concurrency/sleep";
import type { ConsumerConfig } from "./consumer.config";
import { describeError, toErrorMessage } from "./consume.error-handler";
import { ShardWorker, type ShardWorkerOutcome, type ShardWorkerState } from "./shardWorker";

export type CoordinatorDeps = {
  streamName: string;
  workerId: string;
  source: StreamSource;
  leaseStore: LeaseStore;
  processorFactory: RecordProcessorFactory;
  config: ConsumerConfig;
  signal: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
};

export type CoordinatorSummary = {
  workerId: string;
  started: number;
  terminated: number;
  leaseLost: number;
  requested: number;
  fatal: number;
  failed: number;
  notAcquired: number;
};

const isRetryableDiscoveryError = (err: unknown): boolean =>
  isRetryableStreamError(err) || err instanceof LeaseStoreUnavailableError;

type LiveWorker = {
  worker: ShardWorker;
  done: Promise<void>;
};

const createCoordinatorSummaryTracker = (workerId: string) => {
  const summary: CoordinatorSummary = {
    workerId,
    started: 0,
    terminated: 0,
    leaseLost: 0,
    requested: 0,
    fatal: 0,
    failed: 0,
    notAcquired: 0
  };

  return {
    addStarted: () => {
      summary.started += 1;
    },
    addOutcome: (outcome: ShardWorkerOutcome) => {
      switch (outcome) {
        case "terminated":
          summary.terminated += 1;
          break;
        case "lease_lost":
          summary.leaseLost += 1;
          break;
        case "requested":
          summary.requested += 1;
          break;
        case "fatal":
          summary.fatal += 1;
          break;
        case "failed":
          summary.failed += 1;
          break;
        case "not_acquired":
          summary.notAcquired += 1;
          break;
      }
    },
    summary: (): CoordinatorSummary => ({ ...summary })
  };
};

/**
 * Worker pool for one process: discovers shards, keeps lease rows in step with
 * the stream topology and runs at most one ShardWorker per shard.
 */
export class Coordinator {
  private readonly workers = new Map<string, LiveWorker>();
  // shardId -> epoch ms before which the shard is not restarted
  private readonly heldBack = new Map<string, number>();
  private readonly controller = new AbortController();
  private readonly summaryTracker: ReturnType<typeof createCoordinatorSummaryTracker>;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly deps: CoordinatorDeps) {
    this.summaryTracker = createCoordinatorSummaryTracker(deps.workerId);
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());

    if (deps.signal.aborted) {
      this.controller.abort();
    } else {
      deps.signal.addEventListener("abort", () => this.controller.abort(), { once: true });
    }
  }

  liveWorkers(): Array<{ shardId: string; state: ShardWorkerState }> {
    return Array.from(this.workers.values(), ({ worker }) => ({ shardId: worker.shardId, state: worker.state }));
  }

  summary(): CoordinatorSummary {
    return this.summaryTracker.summary();
  }

  /**
   * Runs discovery until the signal aborts, then waits for every worker to shut down.
   * Rethrows an unexpected discovery failure after the workers have stopped.
   */
  async run(): Promise<CoordinatorSummary> {
    const { streamName, workerId, config } = this.deps;
    const signal = this.controller.signal;
    console.log(JSON.stringify({ event: "coordinator.started", streamName, workerId }));

    try {
      while (!signal.aborted) {
        await this.discoverAndAssign();
        await this.sleep(config.discoveryIntervalMs, signal);
      }
    } catch (err) {
      console.error(JSON.stringify({ event: "coordinator.failed", workerId, ...describeError(err) }));
      this.controller.abort();
      await this.awaitWorkers();
      throw err;
    }

    await this.awaitWorkers();
    const summary = this.summary();
    console.log(JSON.stringify({ event: "coordinator.stopped", ...summary }));
    return summary;
  }

  /**
   * One discovery pass. Returns the shard ids a worker was started for.
   */
  async discoverAndAssign(): Promise<string[]> {
    const { source, leaseStore, streamName, workerId, config } = this.deps;

    let shards: ShardDescriptor[];
    let leases: Lease[];
    try {
      shards = await source.listShards(streamName);
      for (const shard of shards) {
        await leaseStore.createLeaseIfAbsent({ shardId: shard.shardId, parentIds: shard.parentIds });
      }
      leases = await leaseStore.listLeases();
    } catch (err) {
      if (!isRetryableDiscoveryError(err)) throw err;
      console.warn(JSON.stringify({ event: "coordinator.discovery_retry", streamName, reason: toErrorMessage(err) }));
      return [];
    }

    const leaseById = new Map(leases.map((lease) => [lease.shardId, lease]));
    const listedShardIds = new Set(shards.map((shard) => shard.shardId));
    const now = this.now();
    const started: string[] = [];

    for (const shard of shards) {
      if (this.controller.signal.aborted) break;
      if (config.maxLeasesPerWorker != null && this.workers.size >= config.maxLeasesPerWorker) break;
      if (this.workers.has(shard.shardId)) continue;
      if (this.isHeldBack(shard.shardId, now)) continue;

      const lease = leaseById.get(shard.shardId);
      if (!lease || isShardEnded(lease)) continue;
      if (!this.parentsComplete(shard, leaseById, listedShardIds)) continue;
      if (!isLeaseAvailableTo(lease, workerId, now)) continue;

      this.startWorker(lease);
      started.push(shard.shardId);
    }

    return started;
  }

  /**
   * A parent is complete once its lease holds SHARD_END and no local worker runs it,
   * or when it is neither listed nor leased any more (trimmed from the stream).
   */
  private parentsComplete(shard: ShardDescriptor, leaseById: Map<string, Lease>, listedShardIds: Set<string>): boolean {
    return shard.parentIds.every((parentId) => {
      if (this.workers.has(parentId)) return false;
      const parentLease = leaseById.get(parentId);
      if (parentLease) return isShardEnded(parentLease);
      return !listedShardIds.has(parentId);
    });
  }

  /** A shard that ended fatal or failed here waits out its lease TTL before a restart. */
  private isHeldBack(shardId: string, now: Date): boolean {
    const until = this.heldBack.get(shardId);
    if (until == null) return false;
    if (now.getTime() < until) return true;
    this.heldBack.delete(shardId);
    return false;
  }

  private startWorker(lease: Lease): void {
    const { streamName, workerId, source, leaseStore, processorFactory, config } = this.deps;
    const worker = new ShardWorker({
      streamName,
      workerId,
      lease,
      source,
      leaseStore,
      processor: processorFactory(),
      config,
      signal: this.controller.signal,
      sleep: this.sleep,
      now: this.now
    });

    this.summaryTracker.addStarted();
    const done = worker.run().then((outcome) => {
      this.workers.delete(lease.shardId);
      this.summaryTracker.addOutcome(outcome);
      if (outcome === "fatal" || outcome === "failed") {
        this.heldBack.set(lease.shardId, this.now().getTime() + config.leaseTtlMs);
      }
      console.log(JSON.stringify({ event: "coordinator.worker_finished", shardId: lease.shardId, outcome }));
    });
    this.workers.set(lease.shardId, { worker, done });
  }

  private async awaitWorkers(): Promise<void> {
    await Promise.all(Array.from(this.workers.values(), (live) => live.done));
  }
}
