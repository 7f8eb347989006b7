import type { StreamDescription } from "../core/stream/stream.types";

export interface StreamAdmin {
  describeStream(streamName: string): Promise<StreamDescription>;
  createStream(streamName: string, shardCount: number): Promise<void>;
  deleteStream(streamName: string): Promise<void>;
  listStreams(): Promise<string[]>;
}
