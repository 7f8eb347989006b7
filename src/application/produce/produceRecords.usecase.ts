import { formatSampleData, formatSamplePartitionKey } from "../../core/record/sampleRecord";
import { isRetryableStreamError, ThrottledError } from "../../core/stream/stream.errors";
import type { PutRecordResult, StreamWriter } from "../../ports/StreamWriter";
import type { Sleep } from "../../shared/concurrency/sleep";
import { retry } from "../../shared/retry/retry";
import type { ProducerConfig } from "./producer.config";

export type ProduceRecordsDeps = {
  writer: StreamWriter;
  streamName: string;
  config: Pick<ProducerConfig, "numRetries" | "backoffMs">;
  signal: AbortSignal;
  maxRecords?: number;
  now?: () => number;
  sleep?: Sleep;
};

const encoder = new TextEncoder();

/**
 * Puts `testData-<ms>` records until the signal aborts (or `maxRecords` is reached).
 * Returns the number of records written.
 */
export const produceRecords = async (deps: ProduceRecordsDeps): Promise<number> => {
  const { writer, streamName, config, signal, maxRecords, now = Date.now, sleep } = deps;
  let produced = 0;

  console.log(JSON.stringify({ event: "producer.started", streamName }));

  while (!signal.aborted && (maxRecords == null || produced < maxRecords)) {
    const createTime = now();
    const partitionKey = formatSamplePartitionKey(createTime);
    const data = encoder.encode(formatSampleData(createTime));

    let result: PutRecordResult;
    try {
      result = await retry(() => writer.putRecord({ streamName, partitionKey, data }), {
        retries: config.numRetries - 1,
        delayMs: config.backoffMs,
        signal,
        sleep,
        shouldRetry: (err) => {
          if (err instanceof ThrottledError) return { retry: true, delayMs: err.retryDelayMs };
          return isRetryableStreamError(err);
        },
        onRetry: ({ attempt, maxAttempts, error }) => {
          console.warn(JSON.stringify({
            event: "producer.retry",
            streamName,
            partitionKey,
            attempt,
            maxAttempts,
            reason: error instanceof Error ? error.message : String(error)
          }));
        }
      });
    } catch (err) {
      if (signal.aborted && isRetryableStreamError(err)) break;
      throw err;
    }

    produced += 1;
    console.log(JSON.stringify({
      event: "producer.put",
      partitionKey,
      shardId: result.shardId,
      sequenceNumber: result.sequenceNumber
    }));
  }

  console.log(JSON.stringify({ event: "producer.stopped", streamName, produced }));
  return produced;
};
