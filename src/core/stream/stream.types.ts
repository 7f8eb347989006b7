export type InitialPosition = "LATEST" | "TRIM_HORIZON";

export type StreamStatus = "CREATING" | "ACTIVE" | "UPDATING" | "DELETING";

export type HashKeyRange = {
  startingHashKey: string; // decimal, inclusive
  endingHashKey: string;   // decimal, inclusive
};

export type ShardDescriptor = {
  shardId: string;
  parentIds: string[];
  closed: boolean;
  hashKeyRange: HashKeyRange;
};

export type StreamRecord = {
  shardId: string;
  partitionKey: string;
  data: Uint8Array;
  sequenceNumber: string;
  approximateArrivalTimestamp: Date;
};

export type InitialStreamPosition = {
  kind: "initial";
  position: InitialPosition;
};

export type AfterSequencePosition = {
  kind: "after";
  sequenceNumber: string;
};

export type StreamPosition = InitialStreamPosition | AfterSequencePosition;

export type StreamDescription = {
  streamName: string;
  status: StreamStatus;
  shardCount: number;
};

export const compareSequenceNumbers = (left: string, right: string): number => {
  const leftValue = BigInt(left);
  const rightValue = BigInt(right);
  if (leftValue === rightValue) return 0;
  return leftValue > rightValue ? 1 : -1;
};

export const isSequenceNumber = (value: unknown): value is string =>
  typeof value === "string" && /^\d+$/.test(value);
