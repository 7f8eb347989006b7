import { createHash } from "crypto";
import type { HashKeyRange } from "./stream.types";

export const MAX_HASH_KEY = (1n << 128n) - 1n;

/**
 * Maps a partition key onto the 128-bit hash space (MD5, big-endian).
 */
export const hashPartitionKey = (partitionKey: string): bigint => {
  const digest = createHash("md5").update(partitionKey, "utf8").digest("hex");
  return BigInt(`0x${digest}`);
};

export const rangeContains = (range: HashKeyRange, hashKey: bigint): boolean =>
  hashKey >= BigInt(range.startingHashKey) && hashKey <= BigInt(range.endingHashKey);

/**
 * Evenly partitions the hash space into `count` contiguous ranges.
 */
export const partitionHashSpace = (count: number): HashKeyRange[] => {
  if (!Number.isInteger(count) || count < 1) {
    throw new Error("count must be an integer >= 1");
  }

  const width = (MAX_HASH_KEY + 1n) / BigInt(count);
  const ranges: HashKeyRange[] = [];
  for (let i = 0; i < count; i += 1) {
    const start = width * BigInt(i);
    const end = i === count - 1 ? MAX_HASH_KEY : start + width - 1n;
    ranges.push({ startingHashKey: start.toString(), endingHashKey: end.toString() });
  }
  return ranges;
};

export const splitRange = (range: HashKeyRange, newStartingHashKey?: string): [HashKeyRange, HashKeyRange] => {
  const start = BigInt(range.startingHashKey);
  const end = BigInt(range.endingHashKey);
  if (end <= start) {
    throw new Error(`Hash key range ${range.startingHashKey}..${range.endingHashKey} cannot be split`);
  }

  const pivot = newStartingHashKey != null ? BigInt(newStartingHashKey) : start + (end - start + 1n) / 2n;
  if (pivot <= start || pivot > end) {
    throw new Error(`newStartingHashKey=${pivot.toString()} is outside ${range.startingHashKey}..${range.endingHashKey}`);
  }

  return [
    { startingHashKey: range.startingHashKey, endingHashKey: (pivot - 1n).toString() },
    { startingHashKey: pivot.toString(), endingHashKey: range.endingHashKey }
  ];
};

/**
 * Joins two adjacent ranges; order of arguments does not matter.
 */
export const mergeRanges = (a: HashKeyRange, b: HashKeyRange): HashKeyRange => {
  const [low, high] = BigInt(a.startingHashKey) < BigInt(b.startingHashKey) ? [a, b] : [b, a];
  if (BigInt(low.endingHashKey) + 1n !== BigInt(high.startingHashKey)) {
    throw new Error("Hash key ranges are not adjacent");
  }
  return { startingHashKey: low.startingHashKey, endingHashKey: high.endingHashKey };
};
