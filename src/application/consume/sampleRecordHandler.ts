import { decodeSampleRecord, type SampleRecord } from "../../core/record/sampleRecord";
import type { Decoder, RecordHandler } from "../../ports/RecordProcessor";

export const sampleRecordDecoder: Decoder<SampleRecord> = {
  decode: decodeSampleRecord
};

/**
 * Logs each record with its age relative to the producer's creation time.
 */
export const createSampleRecordHandler = (now: () => number = Date.now): RecordHandler<SampleRecord> =>
  async (value, record) => {
    console.log(JSON.stringify({
      event: "record.processed",
      shardId: record.shardId,
      sequenceNumber: record.sequenceNumber,
      partitionKey: record.partitionKey,
      data: value.text,
      ageMs: now() - value.createdAt
    }));
  };
