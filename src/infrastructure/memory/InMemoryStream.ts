import { hashPartitionKey, mergeRanges, partitionHashSpace, rangeContains, splitRange } from "../../core/stream/hashKey";
import {
  StreamDeletingError,
  StreamError,
  StreamNotFoundError,
  TransientStreamError
} from "../../core/stream/stream.errors";
import type {
  ShardDescriptor,
  StreamDescription,
  StreamPosition,
  StreamRecord,
  StreamStatus
} from "../../core/stream/stream.types";
import type { StreamAdmin } from "../../ports/StreamAdmin";
import type { GetRecordsParams, RecordBatch, StreamSource } from "../../ports/StreamSource";
import type { PutRecordParams, PutRecordResult, StreamWriter } from "../../ports/StreamWriter";

type ShardState = ShardDescriptor & {
  records: StreamRecord[];
};

type StreamState = {
  name: string;
  status: StreamStatus;
  shards: ShardState[];
};

export const formatShardId = (index: number): string => `shardId-${String(index).padStart(12, "0")}`;

const toDescriptor = (shard: ShardState): ShardDescriptor => ({
  shardId: shard.shardId,
  parentIds: [...shard.parentIds],
  closed: shard.closed,
  hashKeyRange: { ...shard.hashKeyRange }
});

/**
 * Single-process stream service: shards over the MD5 hash space, records routed
 * by partition key, resharding by split and merge. Sequence numbers come from
 * one counter, so they also increase within every shard.
 */
export class InMemoryStream implements StreamSource, StreamAdmin, StreamWriter {
  private readonly streams = new Map<string, StreamState>();
  private lastSequence = 0n;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async listStreams(): Promise<string[]> {
    return Array.from(this.streams.keys()).sort();
  }

  async createStream(streamName: string, shardCount: number): Promise<void> {
    if (this.streams.has(streamName)) {
      throw new StreamError(`Stream ${streamName} already exists`, { streamName });
    }

    const shards = partitionHashSpace(shardCount).map((hashKeyRange, index): ShardState => ({
      shardId: formatShardId(index),
      parentIds: [],
      closed: false,
      hashKeyRange,
      records: []
    }));
    this.streams.set(streamName, { name: streamName, status: "ACTIVE", shards });
  }

  async describeStream(streamName: string): Promise<StreamDescription> {
    const stream = this.getStream(streamName);
    return {
      streamName,
      status: stream.status,
      shardCount: stream.shards.filter((shard) => !shard.closed).length
    };
  }

  async deleteStream(streamName: string): Promise<void> {
    this.getStream(streamName);
    this.streams.delete(streamName);
  }

  async listShards(streamName: string): Promise<ShardDescriptor[]> {
    return this.getStream(streamName).shards.map(toDescriptor);
  }

  async getRecords(params: GetRecordsParams): Promise<RecordBatch> {
    const shard = this.getShard(params.streamName, params.shardId);
    const after = this.resolveAfter(shard, params.position);
    const remaining = shard.records.filter((record) => BigInt(record.sequenceNumber) > after);
    const records = remaining.slice(0, params.limit);
    const last = records[records.length - 1];

    let nextPosition: StreamPosition;
    if (last) {
      nextPosition = { kind: "after", sequenceNumber: last.sequenceNumber };
    } else if (params.position.kind === "initial" && params.position.position === "LATEST") {
      nextPosition = { kind: "after", sequenceNumber: after.toString() };
    } else {
      nextPosition = params.position;
    }

    return {
      records,
      nextPosition,
      shardExhausted: shard.closed && records.length === remaining.length
    };
  }

  async putRecord(params: PutRecordParams): Promise<PutRecordResult> {
    const stream = this.getStream(params.streamName);
    if (stream.status === "DELETING") {
      throw new StreamDeletingError(`Stream ${params.streamName} is being deleted`, { streamName: params.streamName });
    }

    const hashKey = hashPartitionKey(params.partitionKey);
    const shard = stream.shards.find((candidate) => !candidate.closed && rangeContains(candidate.hashKeyRange, hashKey));
    if (!shard) {
      throw new TransientStreamError(`No open shard for partition key ${params.partitionKey}`, {
        streamName: params.streamName
      });
    }

    this.lastSequence += 1n;
    const record: StreamRecord = {
      shardId: shard.shardId,
      partitionKey: params.partitionKey,
      data: Uint8Array.from(params.data),
      sequenceNumber: this.lastSequence.toString(),
      approximateArrivalTimestamp: this.clock()
    };
    shard.records.push(record);

    return { shardId: shard.shardId, sequenceNumber: record.sequenceNumber };
  }

  /**
   * Closes `shardId` and opens two children covering its hash range.
   */
  splitShard(streamName: string, shardId: string, newStartingHashKey?: string): ShardDescriptor[] {
    const stream = this.getStream(streamName);
    const parent = this.getOpenShard(stream, shardId);
    const ranges = splitRange(parent.hashKeyRange, newStartingHashKey);

    parent.closed = true;
    const children = ranges.map((hashKeyRange, index): ShardState => ({
      shardId: formatShardId(stream.shards.length + index),
      parentIds: [parent.shardId],
      closed: false,
      hashKeyRange,
      records: []
    }));
    stream.shards.push(...children);
    return children.map(toDescriptor);
  }

  /**
   * Closes two adjacent shards and opens one child covering both ranges.
   */
  mergeShards(streamName: string, shardId: string, adjacentShardId: string): ShardDescriptor {
    const stream = this.getStream(streamName);
    const first = this.getOpenShard(stream, shardId);
    const second = this.getOpenShard(stream, adjacentShardId);
    const hashKeyRange = mergeRanges(first.hashKeyRange, second.hashKeyRange);

    first.closed = true;
    second.closed = true;
    const child: ShardState = {
      shardId: formatShardId(stream.shards.length),
      parentIds: [first.shardId, second.shardId],
      closed: false,
      hashKeyRange,
      records: []
    };
    stream.shards.push(child);
    return toDescriptor(child);
  }

  setStreamStatus(streamName: string, status: StreamStatus): void {
    this.getStream(streamName).status = status;
  }

  private resolveAfter(shard: ShardState, position: StreamPosition): bigint {
    if (position.kind === "after") return BigInt(position.sequenceNumber);
    if (position.position === "TRIM_HORIZON") return 0n;
    const last = shard.records[shard.records.length - 1];
    return last ? BigInt(last.sequenceNumber) : 0n;
  }

  private getStream(streamName: string): StreamState {
    const stream = this.streams.get(streamName);
    if (!stream) {
      throw new StreamNotFoundError(`Stream ${streamName} not found`, { streamName });
    }
    return stream;
  }

  private getShard(streamName: string, shardId: string): ShardState {
    const shard = this.getStream(streamName).shards.find((candidate) => candidate.shardId === shardId);
    if (!shard) {
      throw new StreamNotFoundError(`Shard ${shardId} not found in stream ${streamName}`, { streamName, shardId });
    }
    return shard;
  }

  private getOpenShard(stream: StreamState, shardId: string): ShardState {
    const shard = this.getShard(stream.name, shardId);
    if (shard.closed) {
      throw new StreamError(`Shard ${shardId} is closed`, { streamName: stream.name, shardId });
    }
    return shard;
  }
}
