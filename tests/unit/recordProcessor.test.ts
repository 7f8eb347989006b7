import { LeaseCheckpointer } from "../../src/application/consume/shardWorker";
import { RetryingRecordProcessor } from "../../src/application/consume/recordProcessor";
import { sampleRecordDecoder } from "../../src/application/consume/sampleRecordHandler";
import { SHARD_END_CHECKPOINT } from "../../src/core/lease/Lease";
import type { SampleRecord } from "../../src/core/record/sampleRecord";
import type { StreamRecord } from "../../src/core/stream/stream.types";
import { InMemoryLeaseStore } from "../support/InMemoryLeaseStore";
import { createSleepRecorder, loggedEvents, makeRecord } from "../support/testing";

const SHARD = "shardId-000000000000";

const setup = (handler: (value: SampleRecord, record: StreamRecord) => Promise<void>) => {
  const store = new InMemoryLeaseStore();
  store.seed({ shardId: SHARD, owner: "worker-a", counter: 1 });
  const checkpointer = new LeaseCheckpointer(store, SHARD, () => 1);
  const { sleep, delays } = createSleepRecorder();
  const clock = { now: 0 };
  const controller = new AbortController();

  const processor = new RetryingRecordProcessor<SampleRecord>({
    decoder: sampleRecordDecoder,
    handler,
    config: { numRetries: 10, backoffMs: 5, checkpointIntervalMs: 60000 },
    sleep,
    monotonicNow: () => clock.now
  });
  processor.initialize({ shardId: SHARD, signal: controller.signal });

  const deliver = async (records: StreamRecord[]) => {
    const last = records[records.length - 1];
    if (last) checkpointer.delivered(last.sequenceNumber);
    await processor.process(records, checkpointer);
  };

  const written = () => store.checkpointWrites.map((write) => write.checkpoint);

  return { store, checkpointer, processor, delays, clock, controller, deliver, written };
};

describe("RetryingRecordProcessor", () => {
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("rejects a malformed record without retrying and applies the rest", async () => {
    const handler = jest.fn(async () => undefined);
    const { processor, deliver, written } = setup(handler);

    await deliver([
      makeRecord("1", "testData-1000"),
      makeRecord("2", "testData-2000"),
      makeRecord("3", "not a sample record"),
      makeRecord("4", "testData-4000"),
      makeRecord("5", "testData-5000")
    ]);

    expect(handler).toHaveBeenCalledTimes(4);
    expect(handler.mock.calls.map((call: unknown[]) => call[0])).toEqual([
      { text: "testData-1000", createdAt: 1000 },
      { text: "testData-2000", createdAt: 2000 },
      { text: "testData-4000", createdAt: 4000 },
      { text: "testData-5000", createdAt: 5000 }
    ]);
    expect(processor.summary()).toEqual({ processed: 4, rejected: 1, skipped: 0 });
    expect(written()).toEqual(["5"]);
    expect(loggedEvents(warnSpy)).toEqual([
      {
        event: "record.rejected",
        shardId: SHARD,
        sequenceNumber: "3",
        partitionKey: "partitionKey-3",
        reason: 'Record does not match sample record format: "not a sample record"',
        skippedCount: 1
      }
    ]);
  });

  it("applies a record once after transient failures", async () => {
    let calls = 0;
    let applied = 0;
    const { processor, deliver, delays } = setup(async () => {
      calls += 1;
      if (calls <= 2) throw new Error("downstream unavailable");
      applied += 1;
    });

    await deliver([makeRecord("1", "testData-1000")]);

    expect(calls).toBe(3);
    expect(applied).toBe(1);
    expect(delays).toEqual([5, 5]);
    expect(processor.summary()).toEqual({ processed: 1, rejected: 0, skipped: 0 });
    expect(loggedEvents(warnSpy).map((line) => line.attempt)).toEqual([1, 2]);
  });

  it("skips a poison pill after numRetries attempts and continues with the batch", async () => {
    const seen: string[] = [];
    const { processor, deliver, delays, written } = setup(async (_value, record) => {
      seen.push(record.sequenceNumber);
      if (record.sequenceNumber === "2") throw new Error("cannot apply");
    });

    await deliver([makeRecord("1", "testData-1000"), makeRecord("2", "testData-2000"), makeRecord("3", "testData-3000")]);

    expect(seen.filter((sequenceNumber) => sequenceNumber === "2")).toHaveLength(10);
    expect(seen[seen.length - 1]).toBe("3");
    expect(delays).toHaveLength(9);
    expect(processor.summary()).toEqual({ processed: 2, rejected: 0, skipped: 1 });
    expect(written()).toEqual(["3"]);
    expect(loggedEvents(errorSpy)).toEqual([
      {
        event: "record.skipped",
        shardId: SHARD,
        sequenceNumber: "2",
        partitionKey: "partitionKey-2",
        reason: "cannot apply",
        attempts: 10,
        skippedCount: 1
      }
    ]);
  });

  it("checkpoints the first batch and then once per interval", async () => {
    const { deliver, clock, written } = setup(async () => undefined);

    await deliver([makeRecord("1", "testData-1000")]);
    clock.now = 30000;
    await deliver([makeRecord("2", "testData-2000")]);
    clock.now = 60000;
    await deliver([makeRecord("3", "testData-3000")]);

    expect(written()).toEqual(["1", "3"]);
  });

  it("writes SHARD_END on termination even when the interval has not elapsed", async () => {
    const { store, checkpointer, processor, deliver, clock, written } = setup(async () => undefined);

    await deliver([makeRecord("1", "testData-1000")]);
    clock.now = 10;
    await deliver([makeRecord("2", "testData-2000")]);
    checkpointer.markShardEnded();
    await processor.shutdown("terminated", checkpointer);

    expect(written()).toEqual(["1", SHARD_END_CHECKPOINT]);
    expect(store.leases.get(SHARD)?.checkpoint).toBe(SHARD_END_CHECKPOINT);
  });

  it("checkpoints the last handled record when shutdown is requested", async () => {
    const { checkpointer, processor, deliver, clock, written } = setup(async () => undefined);

    await deliver([makeRecord("1", "testData-1000")]);
    clock.now = 10;
    await deliver([makeRecord("2", "testData-2000")]);
    await processor.shutdown("requested", checkpointer);

    expect(written()).toEqual(["1", "2"]);
  });

  it("never checkpoints after the lease was lost", async () => {
    const { checkpointer, processor, deliver, clock, written } = setup(async () => undefined);

    await deliver([makeRecord("1", "testData-1000")]);
    clock.now = 10;
    await deliver([makeRecord("2", "testData-2000")]);
    await processor.shutdown("lease_lost", checkpointer);

    expect(written()).toEqual(["1"]);
  });

  it("leaves an interrupted record unhandled when shutdown arrives mid-retry", async () => {
    let calls = 0;
    const context = setup(async () => {
      calls += 1;
      context.controller.abort();
      throw new Error("downstream unavailable");
    });

    await context.deliver([makeRecord("1", "testData-1000"), makeRecord("2", "testData-2000")]);

    expect(calls).toBe(1);
    expect(context.processor.summary()).toEqual({ processed: 0, rejected: 0, skipped: 0 });
    expect(context.written()).toEqual([]);
  });

  it("fails the shard when the lease table rejects the checkpoint schema", async () => {
    const { store, deliver } = setup(async () => undefined);
    store.checkpointResults.push({ status: "schema_error", error: new Error("document failed validation") });

    await expect(deliver([makeRecord("1", "testData-1000")])).rejects.toThrow(
      `Cannot save checkpoint for shard ${SHARD}: lease table rejected the write`
    );
  });
});
