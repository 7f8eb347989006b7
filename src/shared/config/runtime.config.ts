import {
  consumerCaps,
  type ConsumerConfig,
  initialPositions,
  isInitialPosition,
  resolveConsumerConfig
} from "../../application/consume/consumer.config";
import {
  producerCaps,
  type ProducerConfig,
  resolveProducerConfig
} from "../../application/produce/producer.config";
import type { InitialPosition } from "../../core/stream/stream.types";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 30000 }
} as const;

export type RuntimeConfig = {
  consumerConfig: ConsumerConfig;
  producerConfig: ProducerConfig;
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalInitialPosition = (env: NodeJS.ProcessEnv): InitialPosition | undefined => {
  const raw = env.INITIAL_POSITION;
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toUpperCase();
  if (!isInitialPosition(normalized)) {
    throw new Error(`INITIAL_POSITION=${raw} must be one of ${initialPositions.join(", ")}`);
  }
  return normalized;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const numRetries = parseOptionalIntInRange(env, "NUM_RETRIES", consumerCaps.numRetries);
  const backoffMs = parseOptionalIntInRange(env, "BACKOFF_MS", consumerCaps.backoffMs);

  const consumerConfig = resolveConsumerConfig({
    initialPosition: parseOptionalInitialPosition(env),
    leaseTtlMs: parseOptionalIntInRange(env, "LEASE_TTL_MS", consumerCaps.leaseTtlMs),
    checkpointIntervalMs: parseOptionalIntInRange(env, "CHECKPOINT_INTERVAL_MS", consumerCaps.checkpointIntervalMs),
    numRetries,
    backoffMs
  });

  const producerConfig = resolveProducerConfig({
    shardCount: parseOptionalIntInRange(env, "SHARD_COUNT", producerCaps.shardCount),
    numRetries,
    backoffMs
  });

  const timeoutMs =
    parseOptionalIntInRange(env, "STREAM_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 8000;

  return { consumerConfig, producerConfig, timeoutMs };
};
