import { StreamDeletingError, StreamNotFoundError } from "../../core/stream/stream.errors";
import type { StreamAdmin } from "../../ports/StreamAdmin";
import { sleep as defaultSleep, type Sleep } from "../../shared/concurrency/sleep";
import type { ProducerConfig } from "./producer.config";

export class StreamActivationTimeoutError extends Error {
  readonly code = "stream_activation_timeout";

  constructor(readonly streamName: string, readonly timeoutMs: number) {
    super(`Stream ${streamName} never became active within ${timeoutMs}ms`);
    this.name = "StreamActivationTimeoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type EnsureStreamActiveOptions = {
  config: Pick<ProducerConfig, "shardCount" | "streamPollIntervalMs" | "streamActiveTimeoutMs">;
  signal?: AbortSignal;
  sleep?: Sleep;
  monotonicNow?: () => number;
};

const describeOrNull = async (admin: StreamAdmin, streamName: string) => {
  try {
    return await admin.describeStream(streamName);
  } catch (err) {
    if (err instanceof StreamNotFoundError) return null;
    throw err;
  }
};

const waitForStreamToBecomeActive = async (
  admin: StreamAdmin,
  streamName: string,
  options: EnsureStreamActiveOptions
): Promise<boolean> => {
  const { config, signal, sleep = defaultSleep, monotonicNow = () => performance.now() } = options;
  console.log(JSON.stringify({ event: "stream.waiting", streamName }));

  const endTime = monotonicNow() + config.streamActiveTimeoutMs;
  while (monotonicNow() < endTime && !signal?.aborted) {
    await sleep(config.streamPollIntervalMs, signal);
    if (signal?.aborted) break;

    // Not found right after creation just means it is not visible yet.
    const description = await describeOrNull(admin, streamName);
    if (description == null) continue;

    console.log(JSON.stringify({ event: "stream.status", streamName, status: description.status }));
    if (description.status === "ACTIVE") return true;
    if (description.status === "DELETING") {
      throw new StreamDeletingError(`Stream ${streamName} is being deleted`, { streamName });
    }
  }

  if (signal?.aborted) {
    console.log(JSON.stringify({ event: "stream.wait_interrupted", streamName }));
    return false;
  }
  throw new StreamActivationTimeoutError(streamName, config.streamActiveTimeoutMs);
};

/**
 * Creates the stream when missing and waits until it is ACTIVE.
 * Resolves false when the signal aborts before that.
 */
export const ensureStreamActive = async (
  admin: StreamAdmin,
  streamName: string,
  options: EnsureStreamActiveOptions
): Promise<boolean> => {
  const description = await describeOrNull(admin, streamName);

  if (description == null) {
    console.log(JSON.stringify({ event: "stream.creating", streamName, shardCount: options.config.shardCount }));
    await admin.createStream(streamName, options.config.shardCount);
    return waitForStreamToBecomeActive(admin, streamName, options);
  }

  console.log(JSON.stringify({ event: "stream.status", streamName, status: description.status }));
  if (description.status === "DELETING") {
    throw new StreamDeletingError(`Stream ${streamName} is being deleted`, { streamName });
  }
  if (description.status !== "ACTIVE") {
    return waitForStreamToBecomeActive(admin, streamName, options);
  }
  return true;
};
