import type {
  ShardDescriptor,
  StreamDescription,
  StreamPosition,
  StreamRecord,
  StreamStatus
} from "../../core/stream/stream.types";
import { isSequenceNumber } from "../../core/stream/stream.types";
import type { RecordBatch } from "../../ports/StreamSource";

/**
 * JSON shapes exchanged with the stream service. Record payloads travel as base64.
 */
export type WireRecord = {
  sequenceNumber: string;
  partitionKey: string;
  data: string;
  approximateArrivalTimestamp: string;
};

export type WireRecordBatch = {
  records: WireRecord[];
  nextPosition: StreamPosition;
  shardExhausted: boolean;
};

export class WireFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WireFormatError";
  }
}

const streamStatuses: readonly StreamStatus[] = ["CREATING", "ACTIVE", "UPDATING", "DELETING"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (value: Record<string, unknown>, key: string): string => {
  const raw = value[key];
  if (typeof raw !== "string") {
    throw new WireFormatError(`Expected string field "${key}"`);
  }
  return raw;
};

const readArray = (value: Record<string, unknown>, key: string): unknown[] => {
  const raw = value[key];
  if (!Array.isArray(raw)) {
    throw new WireFormatError(`Expected array field "${key}"`);
  }
  return raw;
};

const readObject = (value: unknown, what: string): Record<string, unknown> => {
  if (!isRecord(value)) {
    throw new WireFormatError(`Expected ${what} to be an object`);
  }
  return value;
};

export const toWireRecord = (record: StreamRecord): WireRecord => ({
  sequenceNumber: record.sequenceNumber,
  partitionKey: record.partitionKey,
  data: Buffer.from(record.data).toString("base64"),
  approximateArrivalTimestamp: record.approximateArrivalTimestamp.toISOString()
});

export const toWireRecordBatch = (batch: RecordBatch): WireRecordBatch => ({
  records: batch.records.map(toWireRecord),
  nextPosition: batch.nextPosition,
  shardExhausted: batch.shardExhausted
});

export const parseStreamPosition = (value: unknown): StreamPosition => {
  const raw = readObject(value, "position");
  if (raw.kind === "after" && isSequenceNumber(raw.sequenceNumber)) {
    return { kind: "after", sequenceNumber: raw.sequenceNumber };
  }
  if (raw.kind === "initial" && (raw.position === "LATEST" || raw.position === "TRIM_HORIZON")) {
    return { kind: "initial", position: raw.position };
  }
  throw new WireFormatError("Invalid stream position");
};

export const parseWireRecord = (shardId: string, value: unknown): StreamRecord => {
  const raw = readObject(value, "record");
  const sequenceNumber = readString(raw, "sequenceNumber");
  if (!isSequenceNumber(sequenceNumber)) {
    throw new WireFormatError(`Invalid sequence number ${JSON.stringify(sequenceNumber)}`);
  }

  const arrival = new Date(readString(raw, "approximateArrivalTimestamp"));
  if (Number.isNaN(arrival.getTime())) {
    throw new WireFormatError("Invalid approximateArrivalTimestamp");
  }

  return {
    shardId,
    sequenceNumber,
    partitionKey: readString(raw, "partitionKey"),
    data: new Uint8Array(Buffer.from(readString(raw, "data"), "base64")),
    approximateArrivalTimestamp: arrival
  };
};

export const parseRecordBatch = (shardId: string, value: unknown): RecordBatch => {
  const raw = readObject(value, "record batch");
  if (typeof raw.shardExhausted !== "boolean") {
    throw new WireFormatError('Expected boolean field "shardExhausted"');
  }

  return {
    records: readArray(raw, "records").map((record) => parseWireRecord(shardId, record)),
    nextPosition: parseStreamPosition(raw.nextPosition),
    shardExhausted: raw.shardExhausted
  };
};

export const parseShardDescriptor = (value: unknown): ShardDescriptor => {
  const raw = readObject(value, "shard");
  const range = readObject(raw.hashKeyRange, "hashKeyRange");
  if (typeof raw.closed !== "boolean") {
    throw new WireFormatError('Expected boolean field "closed"');
  }

  return {
    shardId: readString(raw, "shardId"),
    parentIds: readArray(raw, "parentIds").map((parentId) => {
      if (typeof parentId !== "string") throw new WireFormatError("Expected parentIds to hold strings");
      return parentId;
    }),
    closed: raw.closed,
    hashKeyRange: {
      startingHashKey: readString(range, "startingHashKey"),
      endingHashKey: readString(range, "endingHashKey")
    }
  };
};

export const parseShardList = (value: unknown): ShardDescriptor[] =>
  readArray(readObject(value, "shard list"), "shards").map(parseShardDescriptor);

export const parseStreamDescription = (value: unknown): StreamDescription => {
  const raw = readObject(value, "stream description");
  const status = streamStatuses.find((candidate) => candidate === raw.status);
  if (!status) {
    throw new WireFormatError(`Unknown stream status ${JSON.stringify(raw.status)}`);
  }
  if (typeof raw.shardCount !== "number" || !Number.isInteger(raw.shardCount)) {
    throw new WireFormatError('Expected integer field "shardCount"');
  }

  return { streamName: readString(raw, "streamName"), status, shardCount: raw.shardCount };
};

export const parseStreamNames = (value: unknown): string[] =>
  readArray(readObject(value, "stream list"), "streamNames").map((name) => {
    if (typeof name !== "string") throw new WireFormatError("Expected streamNames to hold strings");
    return name;
  });

export const parsePutRecordResult = (value: unknown): { shardId: string; sequenceNumber: string } => {
  const raw = readObject(value, "put result");
  return { shardId: readString(raw, "shardId"), sequenceNumber: readString(raw, "sequenceNumber") };
};
