import { RecordDecodeError } from "../../core/record/sampleRecord";

export type RecordSkipCode = "malformed_record" | "poison_pill";
export type ShardFailureCode = "checkpoint_schema_error" | "worker_unexpected";

export type ShardErrorContext = {
  shardId: string;
  sequenceNumber?: string;
  partitionKey?: string;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const describeError = (reason: unknown): { name: string; message: string; stack?: string } => {
  if (reason instanceof Error) {
    return { name: reason.name || "Error", message: reason.message, stack: reason.stack };
  }
  return { name: "NonError", message: String(reason) };
};

/**
 * Ends the owning shard's task without touching sibling shards.
 */
export class ShardFatalError extends Error {
  readonly code: ShardFailureCode;
  readonly context: ShardErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: ShardFailureCode; message: string; context: ShardErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "ShardFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type RecordSkippedLog = {
  event: "record.rejected" | "record.skipped";
  shardId: string;
  sequenceNumber: string;
  partitionKey: string;
  reason: string;
  attempts?: number;
};

export type RecordFailureDecision = {
  code: RecordSkipCode;
  log: RecordSkippedLog;
};

/**
 * Malformed payloads are rejected on first sight; anything else reaching this
 * point has used up its retries and is skipped as a poison pill.
 */
export const classifyRecordFailure = (
  reason: unknown,
  context: Required<Pick<ShardErrorContext, "shardId" | "sequenceNumber" | "partitionKey">> & { attempts: number }
): RecordFailureDecision => {
  if (reason instanceof RecordDecodeError) {
    return {
      code: "malformed_record",
      log: {
        event: "record.rejected",
        shardId: context.shardId,
        sequenceNumber: context.sequenceNumber,
        partitionKey: context.partitionKey,
        reason: reason.message
      }
    };
  }

  return {
    code: "poison_pill",
    log: {
      event: "record.skipped",
      shardId: context.shardId,
      sequenceNumber: context.sequenceNumber,
      partitionKey: context.partitionKey,
      reason: toErrorMessage(reason),
      attempts: context.attempts
    }
  };
};

export const checkpointSchemaFailure = (context: ShardErrorContext, cause?: unknown): ShardFatalError =>
  new ShardFatalError({
    code: "checkpoint_schema_error",
    message: `Cannot save checkpoint for shard ${context.shardId}: lease table rejected the write`,
    context,
    cause
  });

export type WorkerFailureDecision = {
  outcome: "fatal" | "failed";
  log: {
    event: "shard.fatal" | "shard.failed";
    shardId: string;
    code: ShardFailureCode;
    name: string;
    message: string;
    stack?: string;
  };
};

export const classifyWorkerFailure = (reason: unknown, context: Pick<ShardErrorContext, "shardId">): WorkerFailureDecision => {
  const details = describeError(reason);
  if (reason instanceof ShardFatalError) {
    const cause = reason.cause;
    return {
      outcome: "fatal",
      log: {
        event: "shard.fatal",
        shardId: context.shardId,
        code: reason.code,
        name: details.name,
        message: cause != null ? `${details.message}: ${toErrorMessage(cause)}` : details.message
      }
    };
  }

  return {
    outcome: "failed",
    log: {
      event: "shard.failed",
      shardId: context.shardId,
      code: "worker_unexpected",
      ...details
    }
  };
};

export type ShardRunSummary = {
  processed: number;
  rejected: number;
  skipped: number;
};

export const createShardRunSummaryTracker = () => {
  let processed = 0;
  const skippedByCode: Partial<Record<RecordSkipCode, number>> = {};

  return {
    addProcessed: () => {
      processed += 1;
    },
    addSkipped: (code: RecordSkipCode) => {
      skippedByCode[code] = (skippedByCode[code] ?? 0) + 1;
      return skippedByCode[code] ?? 0;
    },
    summary: (): ShardRunSummary => ({
      processed,
      rejected: skippedByCode.malformed_record ?? 0,
      skipped: skippedByCode.poison_pill ?? 0
    })
  };
};
