type ErrorContext = Partial<{
  streamName: string;
  shardId: string;
  sequenceNumber: string;
  partitionKey: string;
  status: number;
}>;

export type CliErrorEnvelope = {
  event: string;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const allowedStringContextKeys = ["streamName", "shardId", "sequenceNumber", "partitionKey"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedStringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string") {
      sanitizedContext[key] = raw;
    }
  }
  if (typeof value.status === "number" && Number.isFinite(value.status)) {
    sanitizedContext.status = value.status;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (event: string, err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export type ShutdownHandle = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * First SIGINT/SIGTERM aborts the returned signal; workers then drain and release their leases.
 */
export const installShutdownHandler = (
  signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]
): ShutdownHandle => {
  const controller = new AbortController();
  const onSignal = (received: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    console.log(JSON.stringify({ event: "shutdown.requested", signal: received }));
    controller.abort();
  };

  for (const name of signals) process.on(name, onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      for (const name of signals) process.removeListener(name, onSignal);
    }
  };
};
