import type { InitialPosition } from "../../core/stream/stream.types";

export type ConsumerConfig = {
  initialPosition: InitialPosition;
  leaseTtlMs: number;
  checkpointIntervalMs: number;
  numRetries: number;
  backoffMs: number;
  maxRecords: number;
  idleTimeBetweenReadsMs: number;
  discoveryIntervalMs: number;
  maxLeasesPerWorker?: number;
};

export type ConsumerConfigInput = Partial<ConsumerConfig>;

export const defaultConsumerConfig: Omit<ConsumerConfig, "discoveryIntervalMs"> = {
  initialPosition: "LATEST",
  leaseTtlMs: 10000,
  checkpointIntervalMs: 60000,
  numRetries: 10,
  backoffMs: 3000,
  maxRecords: 10000,
  idleTimeBetweenReadsMs: 1000
};

export const consumerCaps = {
  leaseTtlMs: { min: 1000, max: 600000 },
  checkpointIntervalMs: { min: 0, max: 3600000 },
  numRetries: { min: 1, max: 100 },
  backoffMs: { min: 0, max: 600000 },
  maxRecords: { min: 1, max: 10000 },
  idleTimeBetweenReadsMs: { min: 0, max: 60000 },
  discoveryIntervalMs: { min: 100, max: 600000 },
  maxLeasesPerWorker: { min: 1, max: 10000 }
} as const;

export const initialPositions: readonly InitialPosition[] = ["LATEST", "TRIM_HORIZON"];

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const isInitialPosition = (value: unknown): value is InitialPosition =>
  typeof value === "string" && initialPositions.some((position) => position === value);

export const validateConsumerConfig = (config: ConsumerConfig): ConsumerConfig => {
  if (!isInitialPosition(config.initialPosition)) {
    throw new Error(`initialPosition=${String(config.initialPosition)} must be one of ${initialPositions.join(", ")}`);
  }
  assertIntegerInRange("leaseTtlMs", config.leaseTtlMs, consumerCaps.leaseTtlMs.min, consumerCaps.leaseTtlMs.max);
  assertIntegerInRange(
    "checkpointIntervalMs",
    config.checkpointIntervalMs,
    consumerCaps.checkpointIntervalMs.min,
    consumerCaps.checkpointIntervalMs.max
  );
  assertIntegerInRange("numRetries", config.numRetries, consumerCaps.numRetries.min, consumerCaps.numRetries.max);
  assertIntegerInRange("backoffMs", config.backoffMs, consumerCaps.backoffMs.min, consumerCaps.backoffMs.max);
  assertIntegerInRange("maxRecords", config.maxRecords, consumerCaps.maxRecords.min, consumerCaps.maxRecords.max);
  assertIntegerInRange(
    "idleTimeBetweenReadsMs",
    config.idleTimeBetweenReadsMs,
    consumerCaps.idleTimeBetweenReadsMs.min,
    consumerCaps.idleTimeBetweenReadsMs.max
  );
  assertIntegerInRange(
    "discoveryIntervalMs",
    config.discoveryIntervalMs,
    consumerCaps.discoveryIntervalMs.min,
    consumerCaps.discoveryIntervalMs.max
  );
  if (config.maxLeasesPerWorker != null) {
    assertIntegerInRange(
      "maxLeasesPerWorker",
      config.maxLeasesPerWorker,
      consumerCaps.maxLeasesPerWorker.min,
      consumerCaps.maxLeasesPerWorker.max
    );
  }
  return config;
};

/**
 * Fills defaults. Discovery runs twice per lease TTL unless set explicitly.
 */
export const resolveConsumerConfig = (input: ConsumerConfigInput = {}): ConsumerConfig => {
  const leaseTtlMs = input.leaseTtlMs ?? defaultConsumerConfig.leaseTtlMs;
  return validateConsumerConfig({
    initialPosition: input.initialPosition ?? defaultConsumerConfig.initialPosition,
    leaseTtlMs,
    checkpointIntervalMs: input.checkpointIntervalMs ?? defaultConsumerConfig.checkpointIntervalMs,
    numRetries: input.numRetries ?? defaultConsumerConfig.numRetries,
    backoffMs: input.backoffMs ?? defaultConsumerConfig.backoffMs,
    maxRecords: input.maxRecords ?? defaultConsumerConfig.maxRecords,
    idleTimeBetweenReadsMs: input.idleTimeBetweenReadsMs ?? defaultConsumerConfig.idleTimeBetweenReadsMs,
    discoveryIntervalMs: input.discoveryIntervalMs ?? Math.floor(leaseTtlMs / 2),
    maxLeasesPerWorker: input.maxLeasesPerWorker
  });
};
