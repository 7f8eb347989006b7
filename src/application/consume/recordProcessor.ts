import type { StreamRecord } from "../../core/stream/stream.types";
import { RecordDecodeError } from "../../core/record/sampleRecord";
import type {
  Checkpointer,
  Decoder,
  ProcessorInitInput,
  RecordHandler,
  RecordProcessor,
  RecordProcessorFactory,
  ShutdownReason
} from "../../ports/RecordProcessor";
import { sleep as defaultSleep, type Sleep } from "../../shared/concurrency/sleep";
import { retry } from "../../shared/retry/retry";
import { CheckpointManager, type CheckpointOutcome } from "./checkpointManager";
import type { ConsumerConfig } from "./consumer.config";
import {
  checkpointSchemaFailure,
  classifyRecordFailure,
  createShardRunSummaryTracker,
  toErrorMessage
} from "./consume.error-handler";

export type RecordProcessorDeps<T> = {
  decoder: Decoder<T>;
  handler: RecordHandler<T>;
  config: Pick<ConsumerConfig, "numRetries" | "backoffMs" | "checkpointIntervalMs">;
  sleep?: Sleep;
  monotonicNow?: () => number;
};

type RecordOutcome = "handled" | "interrupted";

/**
 * Per-shard processor: decode + apply with bounded retries, poison pills are
 * skipped, and the cursor is checkpointed once per interval.
 */
export class RetryingRecordProcessor<T> implements RecordProcessor {
  private shardId = "";
  private signal: AbortSignal = new AbortController().signal;
  private checkpointManager?: CheckpointManager;
  // null until the first checkpoint attempt, so the first batch is checkpointed right away
  private lastCheckpointAttemptAt: number | null = null;
  private lastHandledSequenceNumber: string | null = null;
  private readonly summaryTracker = createShardRunSummaryTracker();
  private readonly sleep: Sleep;
  private readonly monotonicNow: () => number;

  constructor(private readonly deps: RecordProcessorDeps<T>) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.monotonicNow = deps.monotonicNow ?? (() => performance.now());
  }

  initialize(input: ProcessorInitInput): void {
    this.shardId = input.shardId;
    this.signal = input.signal;
    this.checkpointManager = new CheckpointManager({
      shardId: input.shardId,
      numRetries: this.deps.config.numRetries,
      backoffMs: this.deps.config.backoffMs,
      signal: input.signal,
      sleep: this.sleep
    });
    console.log(JSON.stringify({ event: "shard.initialized", shardId: input.shardId }));
  }

  async process(records: StreamRecord[], checkpointer: Checkpointer): Promise<void> {
    console.log(JSON.stringify({ event: "shard.batch_received", shardId: this.shardId, records: records.length }));

    for (const record of records) {
      if (this.signal.aborted) break;
      const outcome = await this.processRecordWithRetries(record);
      if (outcome === "interrupted") break;
      this.lastHandledSequenceNumber = record.sequenceNumber;
    }

    if (this.checkpointDue() && this.lastHandledSequenceNumber != null) {
      await this.checkpoint(checkpointer, this.lastHandledSequenceNumber);
    }
  }

  async shutdown(reason: ShutdownReason, checkpointer: Checkpointer): Promise<void> {
    console.log(JSON.stringify({
      event: "shard.processor_shutdown",
      shardId: this.shardId,
      reason,
      ...this.summaryTracker.summary()
    }));

    if (reason === "terminated") {
      // Shard end must be recorded before child shards can be leased.
      await this.checkpoint(checkpointer);
      return;
    }

    if (reason === "requested" && this.lastHandledSequenceNumber != null) {
      await this.checkpoint(checkpointer, this.lastHandledSequenceNumber);
    }
  }

  summary() {
    return this.summaryTracker.summary();
  }

  private checkpointDue(): boolean {
    if (this.lastCheckpointAttemptAt == null) return true;
    return this.monotonicNow() - this.lastCheckpointAttemptAt >= this.deps.config.checkpointIntervalMs;
  }

  private async checkpoint(checkpointer: Checkpointer, sequenceNumber?: string): Promise<CheckpointOutcome> {
    if (!this.checkpointManager) {
      throw new Error("Record processor used before initialize()");
    }

    const outcome = await this.checkpointManager.checkpoint(checkpointer, sequenceNumber);
    this.lastCheckpointAttemptAt = this.monotonicNow();
    if (outcome === "fatal") {
      throw checkpointSchemaFailure({ shardId: this.shardId, sequenceNumber });
    }
    return outcome;
  }

  private async processRecordWithRetries(record: StreamRecord): Promise<RecordOutcome> {
    const { numRetries, backoffMs } = this.deps.config;
    let attempts = 0;

    try {
      await retry(async () => {
        attempts += 1;
        const value = this.deps.decoder.decode(record.data);
        await this.deps.handler(value, record);
      }, {
        retries: numRetries - 1,
        delayMs: backoffMs,
        signal: this.signal,
        sleep: this.sleep,
        shouldRetry: (err) => !(err instanceof RecordDecodeError),
        onRetry: ({ attempt, maxAttempts, error }) => {
          console.warn(JSON.stringify({
            event: "record.retry",
            shardId: this.shardId,
            sequenceNumber: record.sequenceNumber,
            attempt,
            maxAttempts,
            reason: toErrorMessage(error)
          }));
        }
      });
    } catch (err) {
      if (this.signal.aborted && !(err instanceof RecordDecodeError) && attempts < numRetries) {
        return "interrupted";
      }

      const decision = classifyRecordFailure(err, {
        shardId: this.shardId,
        sequenceNumber: record.sequenceNumber,
        partitionKey: record.partitionKey,
        attempts
      });
      const skippedCount = this.summaryTracker.addSkipped(decision.code);
      const line = JSON.stringify({ ...decision.log, skippedCount });
      if (decision.code === "poison_pill") {
        console.error(line);
      } else {
        console.warn(line);
      }
      return "handled";
    }

    this.summaryTracker.addProcessed();
    return "handled";
  }
}

export const createRecordProcessorFactory = <T>(deps: RecordProcessorDeps<T>): RecordProcessorFactory =>
  () => new RetryingRecordProcessor(deps);
