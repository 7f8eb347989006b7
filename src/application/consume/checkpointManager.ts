import type { Checkpointer } from "../../ports/RecordProcessor";
import { sleep as defaultSleep, type Sleep } from "../../shared/concurrency/sleep";
import { toErrorMessage } from "./consume.error-handler";

export type CheckpointOutcome = "checkpointed" | "superseded" | "gave_up" | "fatal";

export type CheckpointManagerOptions = {
  shardId: string;
  numRetries: number;
  backoffMs: number;
  signal?: AbortSignal;
  sleep?: Sleep;
};

/**
 * Writes shard checkpoints through the lease table.
 * Throttling is retried with a fixed backoff, a superseded lease is never retried,
 * and schema errors are reported as fatal for the shard. Never throws for store results.
 */
export class CheckpointManager {
  private readonly sleep: Sleep;

  constructor(private readonly options: CheckpointManagerOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async checkpoint(checkpointer: Checkpointer, sequenceNumber?: string): Promise<CheckpointOutcome> {
    const { shardId, numRetries, backoffMs, signal } = this.options;
    const target = sequenceNumber ?? checkpointer.lastDeliveredSequenceNumber();
    console.log(JSON.stringify({ event: "checkpoint.started", shardId, sequenceNumber: target }));

    for (let attempt = 1; attempt <= numRetries; attempt += 1) {
      const result = await checkpointer.checkpoint(sequenceNumber);

      switch (result.status) {
        case "ok":
          console.log(JSON.stringify({ event: "checkpoint.completed", shardId, applied: result.applied, attempt }));
          return "checkpointed";
        case "conflict":
          // Lease moved to another worker (fail over); writing now would race the new owner.
          console.log(JSON.stringify({ event: "checkpoint.superseded", shardId }));
          return "superseded";
        case "schema_error":
          console.error(JSON.stringify({
            event: "checkpoint.fatal",
            shardId,
            reason: toErrorMessage(result.error)
          }));
          return "fatal";
        case "throttled":
          if (attempt >= numRetries || signal?.aborted) {
            console.error(JSON.stringify({
              event: "checkpoint.gave_up",
              shardId,
              attempt,
              maxAttempts: numRetries,
              reason: toErrorMessage(result.error)
            }));
            return "gave_up";
          }
          console.warn(JSON.stringify({ event: "checkpoint.retry", shardId, attempt, maxAttempts: numRetries }));
          await this.sleep(backoffMs, signal);
          break;
      }
    }

    return "gave_up";
  }
}
