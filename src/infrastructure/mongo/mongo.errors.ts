import { MongoNetworkError, MongoServerError, MongoServerSelectionError } from "mongodb";

export type MongoFailureClass = "throttled" | "schema_error" | "unknown";

// ExceededTimeLimit, WriteConflict, ShutdownInProgress, PrimarySteppedDown,
// NotWritablePrimary, InterruptedAtShutdown, request rate too large
const throttledCodes = new Set([50, 112, 91, 189, 10107, 11600, 16500]);

// Unauthorized, NamespaceNotFound, CommandNotFound, DocumentValidationFailure
const schemaCodes = new Set([13, 26, 59, 121]);

export const NAMESPACE_NOT_FOUND = 26;

export const classifyMongoFailure = (err: unknown): MongoFailureClass => {
  if (err instanceof MongoNetworkError || err instanceof MongoServerSelectionError) return "throttled";
  if (err instanceof MongoServerError && typeof err.code === "number") {
    if (throttledCodes.has(err.code)) return "throttled";
    if (schemaCodes.has(err.code)) return "schema_error";
  }
  return "unknown";
};
