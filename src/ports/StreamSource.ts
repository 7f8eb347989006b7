import type { ShardDescriptor, StreamPosition, StreamRecord } from "../core/stream/stream.types";

export type GetRecordsParams = {
  streamName: string;
  shardId: string;
  position: StreamPosition;
  limit: number;
};

export type RecordBatch = {
  records: StreamRecord[];
  nextPosition: StreamPosition;
  shardExhausted: boolean; // closed and nothing left past `nextPosition`
};

/**
 * Read side of the stream service.
 * Implementations throw StreamNotFoundError, ThrottledError or TransientStreamError.
 */
export interface StreamSource {
  listShards(streamName: string): Promise<ShardDescriptor[]>;
  getRecords(params: GetRecordsParams): Promise<RecordBatch>;
}
