import {
  checkpointSchemaFailure,
  classifyRecordFailure,
  classifyWorkerFailure,
  createShardRunSummaryTracker,
  describeError,
  ShardFatalError
} from "../../src/application/consume/consume.error-handler";
import { RecordDecodeError } from "../../src/core/record/sampleRecord";

const recordContext = {
  shardId: "shardId-000000000000",
  sequenceNumber: "42",
  partitionKey: "pk-42",
  attempts: 10
};

describe("consume error handling", () => {
  it("rejects malformed records", () => {
    expect(classifyRecordFailure(new RecordDecodeError("Malformed record: payload is not valid UTF-8"), recordContext)).toEqual({
      code: "malformed_record",
      log: {
        event: "record.rejected",
        shardId: "shardId-000000000000",
        sequenceNumber: "42",
        partitionKey: "pk-42",
        reason: "Malformed record: payload is not valid UTF-8"
      }
    });
  });

  it("skips other failures as poison pills", () => {
    expect(classifyRecordFailure("handler exploded", recordContext)).toEqual({
      code: "poison_pill",
      log: {
        event: "record.skipped",
        shardId: "shardId-000000000000",
        sequenceNumber: "42",
        partitionKey: "pk-42",
        reason: "handler exploded",
        attempts: 10
      }
    });
  });

  it("describes non-Error values", () => {
    expect(describeError(17)).toEqual({ name: "NonError", message: "17" });
  });

  it("classifies ShardFatalError as fatal for its shard only", () => {
    const error = checkpointSchemaFailure({ shardId: "shardId-000000000003" });

    expect(error).toBeInstanceOf(ShardFatalError);
    expect(classifyWorkerFailure(error, { shardId: "shardId-000000000003" })).toEqual({
      outcome: "fatal",
      log: {
        event: "shard.fatal",
        shardId: "shardId-000000000003",
        code: "checkpoint_schema_error",
        name: "ShardFatalError",
        message: "Cannot save checkpoint for shard shardId-000000000003: lease table rejected the write"
      }
    });
  });

  it("classifies anything else as a failed worker", () => {
    const decision = classifyWorkerFailure(new TypeError("x is undefined"), { shardId: "shardId-000000000003" });

    expect(decision.outcome).toBe("failed");
    expect(decision.log).toEqual(expect.objectContaining({
      event: "shard.failed",
      code: "worker_unexpected",
      name: "TypeError",
      message: "x is undefined"
    }));
  });

  it("counts processed, rejected and skipped records", () => {
    const tracker = createShardRunSummaryTracker();
    tracker.addProcessed();
    tracker.addProcessed();
    expect(tracker.addSkipped("malformed_record")).toBe(1);
    expect(tracker.addSkipped("poison_pill")).toBe(1);
    expect(tracker.addSkipped("poison_pill")).toBe(2);

    expect(tracker.summary()).toEqual({ processed: 2, rejected: 1, skipped: 2 });
  });
});
