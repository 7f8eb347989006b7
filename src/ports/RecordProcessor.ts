import type { StreamRecord } from "../core/stream/stream.types";
import type { CheckpointWriteResult } from "./LeaseStore";

export type ShutdownReason = "terminated" | "lease_lost" | "requested";

export interface Checkpointer {
  /**
   * Persists `sequenceNumber` (default: last record delivered to the processor).
   * After the shard is exhausted the checkpointer writes SHARD_END instead.
   */
  checkpoint(sequenceNumber?: string): Promise<CheckpointWriteResult>;
  lastDeliveredSequenceNumber(): string | null;
}

export type ProcessorInitInput = {
  shardId: string;
  signal: AbortSignal;
};

export interface RecordProcessor {
  initialize(input: ProcessorInitInput): void;
  process(records: StreamRecord[], checkpointer: Checkpointer): Promise<void>;
  shutdown(reason: ShutdownReason, checkpointer: Checkpointer): Promise<void>;
}

/** Returns a fresh processor per shard. */
export type RecordProcessorFactory = () => RecordProcessor;

export interface Decoder<T> {
  /** Throws RecordDecodeError for payloads that can never be processed. */
  decode(data: Uint8Array): T;
}

export type RecordHandler<T> = (value: T, record: StreamRecord) => Promise<void>;
