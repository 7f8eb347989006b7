/**
 * Lease rows are keyed by shard id (`_id`); owner lookups back operator queries
 * such as "which shards does this worker hold".
 */
export const mongoIndexes = {
  leaseCollection: [
    { keys: { owner: 1 }, options: {} }
  ]
};
