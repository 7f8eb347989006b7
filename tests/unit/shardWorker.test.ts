import { createRecordProcessorFactory } from "../../src/application/consume/recordProcessor";
import { sampleRecordDecoder } from "../../src/application/consume/sampleRecordHandler";
import { checkpointSchemaFailure } from "../../src/application/consume/consume.error-handler";
import { ShardWorker, type ShardWorkerDeps } from "../../src/application/consume/shardWorker";
import { MongoNetworkError } from "mongodb";
import { SHARD_END_CHECKPOINT, type Lease } from "../../src/core/lease/Lease";
import { LeaseStoreUnavailableError } from "../../src/core/lease/lease.errors";
import { TransientStreamError } from "../../src/core/stream/stream.errors";
import type { StreamRecord } from "../../src/core/stream/stream.types";
import type { GetRecordsParams, RecordBatch, StreamSource } from "../../src/ports/StreamSource";
import type { Checkpointer, ProcessorInitInput, ShutdownReason } from "../../src/ports/RecordProcessor";
import { InMemoryStream } from "../../src/infrastructure/memory/InMemoryStream";
import { InMemoryLeaseStore } from "../support/InMemoryLeaseStore";
import { createSleepRecorder, loggedEvents } from "../support/testing";

const STREAM = "orders";
const PARENT = "shardId-000000000000";
const config: ShardWorkerDeps["config"] = {
  initialPosition: "LATEST",
  leaseTtlMs: 10000,
  maxRecords: 100,
  idleTimeBetweenReadsMs: 50
};
const encoder = new TextEncoder();

const createFakeProcessor = () => ({
  initialize: jest.fn<void, [ProcessorInitInput]>(),
  process: jest.fn<Promise<void>, [StreamRecord[], Checkpointer]>().mockResolvedValue(undefined),
  shutdown: jest.fn<Promise<void>, [ShutdownReason, Checkpointer]>().mockResolvedValue(undefined)
});

const exhaustedBatch: RecordBatch = {
  records: [],
  nextPosition: { kind: "initial", position: "TRIM_HORIZON" },
  shardExhausted: true
};

const createFakeSource = () => {
  const getRecords = jest.fn<Promise<RecordBatch>, [GetRecordsParams]>().mockResolvedValue(exhaustedBatch);
  const source: StreamSource = {
    listShards: async () => [],
    getRecords
  };
  return { source, getRecords };
};

/** Stream with one shard holding `count` sample records, then split so the shard is closed. */
const createClosedShard = async (count: number) => {
  const stream = new InMemoryStream();
  await stream.createStream(STREAM, 1);
  for (let i = 1; i <= count; i += 1) {
    await stream.putRecord({ streamName: STREAM, partitionKey: `pk-${i}`, data: encoder.encode(`testData-${i}000`) });
  }
  stream.splitShard(STREAM, PARENT);
  return stream;
};

describe("ShardWorker", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("drains a closed shard, writes SHARD_END and releases the lease", async () => {
    const stream = await createClosedShard(3);
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });
    const handler = jest.fn(async () => undefined);
    const { sleep } = createSleepRecorder();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source: stream,
      leaseStore: store,
      processor: createRecordProcessorFactory({
        decoder: sampleRecordDecoder,
        handler,
        config: { numRetries: 3, backoffMs: 0, checkpointIntervalMs: 60000 },
        sleep
      })(),
      config: { ...config, initialPosition: "TRIM_HORIZON" },
      signal: new AbortController().signal,
      sleep
    });

    await expect(worker.run()).resolves.toBe("terminated");

    expect(handler).toHaveBeenCalledTimes(3);
    expect(store.checkpointWrites.map((write) => write.checkpoint)).toEqual(["3", SHARD_END_CHECKPOINT]);
    expect(store.leases.get(PARENT)).toEqual({
      shardId: PARENT,
      owner: null,
      expiresAt: null,
      checkpoint: SHARD_END_CHECKPOINT,
      counter: 3,
      parentIds: []
    });
    expect(worker.state).toBe("SHUTDOWN");
  });

  it("still ends as terminated when the lease table is unreachable for the release", async () => {
    const stream = await createClosedShard(3);
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });
    const warnSpy = jest.spyOn(console, "warn");
    jest.spyOn(store, "releaseLease").mockRejectedValueOnce(
      new LeaseStoreUnavailableError("releaseLease", new MongoNetworkError("connection reset"))
    );
    const { sleep } = createSleepRecorder();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source: stream,
      leaseStore: store,
      processor: createRecordProcessorFactory({
        decoder: sampleRecordDecoder,
        handler: async () => undefined,
        config: { numRetries: 3, backoffMs: 0, checkpointIntervalMs: 60000 },
        sleep
      })(),
      config: { ...config, initialPosition: "TRIM_HORIZON" },
      signal: new AbortController().signal,
      sleep
    });

    await expect(worker.run()).resolves.toBe("terminated");

    expect(store.leases.get(PARENT)).toEqual(expect.objectContaining({
      owner: "worker-a",
      checkpoint: SHARD_END_CHECKPOINT,
      counter: 2
    }));
    expect(loggedEvents(warnSpy).filter((line) => line.event === "shard.release_skipped")).toEqual([
      {
        event: "shard.release_skipped",
        shardId: PARENT,
        counter: 2,
        reason: "Lease store unavailable during releaseLease"
      }
    ]);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("resumes after the stored checkpoint", async () => {
    const stream = await createClosedShard(3);
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT, checkpoint: "2" });
    const seen: string[] = [];

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source: stream,
      leaseStore: store,
      processor: createRecordProcessorFactory({
        decoder: sampleRecordDecoder,
        handler: async (_value, record) => {
          seen.push(record.sequenceNumber);
        },
        config: { numRetries: 3, backoffMs: 0, checkpointIntervalMs: 60000 }
      })(),
      config,
      signal: new AbortController().signal,
      sleep: createSleepRecorder().sleep
    });

    await expect(worker.run()).resolves.toBe("terminated");
    expect(seen).toEqual(["3"]);
  });

  it.each([
    {
      name: "the stored checkpoint",
      lease: { checkpoint: "41", parentIds: [] },
      position: { kind: "after", sequenceNumber: "41" }
    },
    {
      name: "TRIM_HORIZON for a child shard",
      lease: { checkpoint: null, parentIds: ["shardId-000000000007"] },
      position: { kind: "initial", position: "TRIM_HORIZON" }
    },
    {
      name: "the configured initial position otherwise",
      lease: { checkpoint: null, parentIds: [] },
      position: { kind: "initial", position: "LATEST" }
    }
  ])("starts reading from $name", async ({ lease, position }) => {
    const store = new InMemoryLeaseStore();
    const seeded = store.seed({ shardId: "shardId-000000000009", ...lease });
    const { source, getRecords } = createFakeSource();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease: seeded,
      source,
      leaseStore: store,
      processor: createFakeProcessor(),
      config,
      signal: new AbortController().signal,
      sleep: createSleepRecorder().sleep
    });

    await expect(worker.run()).resolves.toBe("terminated");
    expect(getRecords).toHaveBeenCalledWith({
      streamName: STREAM,
      shardId: "shardId-000000000009",
      position,
      limit: 100
    });
  });

  it("does not start when another worker holds the lease", async () => {
    const store = new InMemoryLeaseStore();
    const lease = store.seed({
      shardId: PARENT,
      owner: "worker-b",
      expiresAt: new Date(Date.now() + 60000),
      counter: 4
    });
    const processor = createFakeProcessor();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source: createFakeSource().source,
      leaseStore: store,
      processor,
      config,
      signal: new AbortController().signal
    });

    await expect(worker.run()).resolves.toBe("not_acquired");
    expect(processor.initialize).not.toHaveBeenCalled();
    expect(store.leases.get(PARENT)?.owner).toBe("worker-b");
  });

  it("lets exactly one of two workers with the same lease counter acquire it", async () => {
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });

    const workers = ["worker-a", "worker-b"].map((workerId) => new ShardWorker({
      streamName: STREAM,
      workerId,
      lease,
      source: createFakeSource().source,
      leaseStore: store,
      processor: createFakeProcessor(),
      config,
      signal: new AbortController().signal,
      sleep: createSleepRecorder().sleep
    }));

    const outcomes = await Promise.all(workers.map((worker) => worker.run()));

    expect([...outcomes].sort()).toEqual(["not_acquired", "terminated"]);
  });

  it("shuts down without checkpointing or releasing when the lease is lost", async () => {
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });
    store.acquireResults.push(
      { status: "acquired", lease: { ...lease, owner: "worker-a", counter: 1 } },
      { status: "conflict" }
    );
    const processor = createFakeProcessor();
    const { source, getRecords } = createFakeSource();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source,
      leaseStore: store,
      processor,
      config,
      signal: new AbortController().signal
    });

    await expect(worker.run()).resolves.toBe("lease_lost");

    expect(getRecords).not.toHaveBeenCalled();
    expect(processor.shutdown).toHaveBeenCalledWith("lease_lost", expect.anything());
    expect(store.releases).toEqual([]);
    expect(store.checkpointWrites).toEqual([]);
  });

  it("releases the lease when shutdown is requested", async () => {
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });
    const controller = new AbortController();
    controller.abort();
    const processor = createFakeProcessor();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source: createFakeSource().source,
      leaseStore: store,
      processor,
      config,
      signal: controller.signal
    });

    await expect(worker.run()).resolves.toBe("requested");

    expect(processor.shutdown).toHaveBeenCalledWith("requested", expect.anything());
    expect(store.releases).toEqual([{ shardId: PARENT, workerId: "worker-a", counter: 1 }]);
    expect(store.leases.get(PARENT)?.owner).toBeNull();
  });

  it("waits and retries a throttled read", async () => {
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });
    const { source, getRecords } = createFakeSource();
    getRecords.mockRejectedValueOnce(new TransientStreamError("GET /streams/orders/shards failed: 503"));
    const { sleep, delays } = createSleepRecorder();

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source,
      leaseStore: store,
      processor: createFakeProcessor(),
      config,
      signal: new AbortController().signal,
      sleep
    });

    await expect(worker.run()).resolves.toBe("terminated");
    expect(getRecords).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([50]);
  });

  it("reports an unexpected failure as failed", async () => {
    const store = new InMemoryLeaseStore();
    const lease = store.seed({ shardId: PARENT });
    const { source, getRecords } = createFakeSource();
    getRecords.mockRejectedValueOnce(new Error("disk on fire"));

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source,
      leaseStore: store,
      processor: createFakeProcessor(),
      config,
      signal: new AbortController().signal
    });

    await expect(worker.run()).resolves.toBe("failed");
    expect(worker.state).toBe("SHUTDOWN");
    expect(loggedEvents(errorSpy)).toEqual([
      expect.objectContaining({
        event: "shard.failed",
        shardId: PARENT,
        code: "worker_unexpected",
        name: "Error",
        message: "disk on fire"
      })
    ]);
  });

  it("reports a checkpoint schema failure as fatal for the shard", async () => {
    const store = new InMemoryLeaseStore();
    const lease: Lease = store.seed({ shardId: PARENT });
    const { source, getRecords } = createFakeSource();
    getRecords.mockResolvedValueOnce({
      records: [
        {
          shardId: PARENT,
          partitionKey: "pk-1",
          data: encoder.encode("testData-1000"),
          sequenceNumber: "1",
          approximateArrivalTimestamp: new Date("2026-01-01T00:00:00.000Z")
        }
      ],
      nextPosition: { kind: "after", sequenceNumber: "1" },
      shardExhausted: false
    });
    const processor = createFakeProcessor();
    processor.process.mockRejectedValueOnce(
      checkpointSchemaFailure({ shardId: PARENT, sequenceNumber: "1" }, new Error("document failed validation"))
    );

    const worker = new ShardWorker({
      streamName: STREAM,
      workerId: "worker-a",
      lease,
      source,
      leaseStore: store,
      processor,
      config,
      signal: new AbortController().signal
    });

    await expect(worker.run()).resolves.toBe("fatal");
    expect(loggedEvents(errorSpy)).toEqual([
      {
        event: "shard.fatal",
        shardId: PARENT,
        code: "checkpoint_schema_error",
        name: "ShardFatalError",
        message: `Cannot save checkpoint for shard ${PARENT}: lease table rejected the write: document failed validation`
      }
    ]);
  });
});
