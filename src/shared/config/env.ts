export type Env = {
  MONGO_URI: string;
  STREAM_BASE_URL: string;
  APP_NAME: string;
  STREAM_NAME: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

// APP_NAME doubles as the lease collection name.
const validateResourceName = (name: string, value: string): string => {
  const normalized = value.trim();
  if (!/^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/.test(normalized) || normalized.startsWith("system.")) {
    throw new Error(`${name} must be 1-128 characters of letters, digits, '_', '.' or '-'. Received: ${value}`);
  }
  return normalized;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/shard-stream";
  const STREAM_BASE_URL = validateHttpUrl("STREAM_BASE_URL", env.STREAM_BASE_URL ?? "http://localhost:4567");
  const APP_NAME = validateResourceName("APP_NAME", env.APP_NAME ?? "SampleStreamApplication");
  const STREAM_NAME = validateResourceName("STREAM_NAME", env.STREAM_NAME ?? "myFirstStream");

  return { MONGO_URI, STREAM_BASE_URL, APP_NAME, STREAM_NAME };
};
