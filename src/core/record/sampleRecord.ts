export class RecordDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordDecodeError";
  }
}

export type SampleRecord = {
  text: string;
  createdAt: number; // epoch ms written by the producer
};

export const SAMPLE_DATA_PREFIX = "testData-";

const utf8 = new TextDecoder("utf-8", { fatal: true });

const decodeUtf8 = (data: Uint8Array): string => {
  try {
    return utf8.decode(data);
  } catch {
    throw new RecordDecodeError("Malformed record: payload is not valid UTF-8");
  }
};

export const formatSampleData = (createTime: number): string => `${SAMPLE_DATA_PREFIX}${createTime}`;

export const formatSamplePartitionKey = (createTime: number): string => `partitionKey-${createTime}`;

/**
 * Decodes `testData-<epochMs>` payloads written by the producer.
 */
export const decodeSampleRecord = (data: Uint8Array): SampleRecord => {
  const text = decodeUtf8(data);
  if (!text.startsWith(SAMPLE_DATA_PREFIX)) {
    throw new RecordDecodeError(`Record does not match sample record format: ${JSON.stringify(text)}`);
  }

  const timestamp = text.slice(SAMPLE_DATA_PREFIX.length);
  if (!/^\d+$/.test(timestamp)) {
    throw new RecordDecodeError(`Record does not match sample record format: ${JSON.stringify(text)}`);
  }

  const createdAt = Number.parseInt(timestamp, 10);
  if (!Number.isSafeInteger(createdAt)) {
    throw new RecordDecodeError(`Record creation time is out of range: ${JSON.stringify(text)}`);
  }

  return { text, createdAt };
};
