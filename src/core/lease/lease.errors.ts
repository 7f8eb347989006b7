/**
 * Lease table temporarily unreachable (network, failover, rate limit).
 * The operation can be tried again on the next tick.
 */
export class LeaseStoreUnavailableError extends Error {
  readonly code = "lease_store_unavailable";
  readonly cause?: unknown;

  constructor(readonly operation: string, cause?: unknown) {
    super(`Lease store unavailable during ${operation}`);
    this.name = "LeaseStoreUnavailableError";
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
