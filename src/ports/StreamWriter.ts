export type PutRecordParams = {
  streamName: string;
  partitionKey: string;
  data: Uint8Array;
};

export type PutRecordResult = {
  shardId: string;
  sequenceNumber: string;
};

export interface StreamWriter {
  putRecord(params: PutRecordParams): Promise<PutRecordResult>;
}
