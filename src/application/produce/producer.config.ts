export type ProducerConfig = {
  shardCount: number;
  streamPollIntervalMs: number;
  streamActiveTimeoutMs: number;
  numRetries: number;
  backoffMs: number;
};

export const defaultProducerConfig: ProducerConfig = {
  shardCount: 1,
  streamPollIntervalMs: 20000,
  streamActiveTimeoutMs: 600000,
  numRetries: 10,
  backoffMs: 3000
};

export const producerCaps = {
  shardCount: { min: 1, max: 500 },
  streamPollIntervalMs: { min: 0, max: 600000 },
  streamActiveTimeoutMs: { min: 0, max: 3600000 },
  numRetries: { min: 1, max: 100 },
  backoffMs: { min: 0, max: 600000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateProducerConfig = (config: ProducerConfig): ProducerConfig => {
  assertIntegerInRange("shardCount", config.shardCount, producerCaps.shardCount.min, producerCaps.shardCount.max);
  assertIntegerInRange(
    "streamPollIntervalMs",
    config.streamPollIntervalMs,
    producerCaps.streamPollIntervalMs.min,
    producerCaps.streamPollIntervalMs.max
  );
  assertIntegerInRange(
    "streamActiveTimeoutMs",
    config.streamActiveTimeoutMs,
    producerCaps.streamActiveTimeoutMs.min,
    producerCaps.streamActiveTimeoutMs.max
  );
  assertIntegerInRange("numRetries", config.numRetries, producerCaps.numRetries.min, producerCaps.numRetries.max);
  assertIntegerInRange("backoffMs", config.backoffMs, producerCaps.backoffMs.min, producerCaps.backoffMs.max);
  return config;
};

export const resolveProducerConfig = (input: Partial<ProducerConfig> = {}): ProducerConfig =>
  validateProducerConfig({
    shardCount: input.shardCount ?? defaultProducerConfig.shardCount,
    streamPollIntervalMs: input.streamPollIntervalMs ?? defaultProducerConfig.streamPollIntervalMs,
    streamActiveTimeoutMs: input.streamActiveTimeoutMs ?? defaultProducerConfig.streamActiveTimeoutMs,
    numRetries: input.numRetries ?? defaultProducerConfig.numRetries,
    backoffMs: input.backoffMs ?? defaultProducerConfig.backoffMs
  });
