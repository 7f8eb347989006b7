type StreamErrorContext = {
  streamName?: string;
  shardId?: string;
  status?: number;
};

export class StreamError extends Error {
  readonly context: StreamErrorContext;
  readonly cause?: unknown;

  constructor(message: string, context: StreamErrorContext = {}, cause?: unknown) {
    super(message);
    this.name = "StreamError";
    this.context = context;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Stream or shard does not exist. Permanent. */
export class StreamNotFoundError extends StreamError {
  readonly code = "stream_not_found";

  constructor(message: string, context: StreamErrorContext = {}, cause?: unknown) {
    super(message, context, cause);
    this.name = "StreamNotFoundError";
  }
}

/** Stream is being deleted. Permanent. */
export class StreamDeletingError extends StreamError {
  readonly code = "stream_deleting";

  constructor(message: string, context: StreamErrorContext = {}, cause?: unknown) {
    super(message, context, cause);
    this.name = "StreamDeletingError";
  }
}

export class ThrottledError extends StreamError {
  readonly code = "throttled";
  readonly retryDelayMs?: number;

  constructor(message: string, context: StreamErrorContext = {}, retryDelayMs?: number) {
    super(message, context);
    this.name = "ThrottledError";
    this.retryDelayMs = retryDelayMs;
  }
}

export class TransientStreamError extends StreamError {
  readonly code = "transient";

  constructor(message: string, context: StreamErrorContext = {}, cause?: unknown) {
    super(message, context, cause);
    this.name = "TransientStreamError";
  }
}

export const isRetryableStreamError = (err: unknown): err is ThrottledError | TransientStreamError =>
  err instanceof ThrottledError || err instanceof TransientStreamError;
