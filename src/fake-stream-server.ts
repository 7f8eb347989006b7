import http from "http";
import { URL } from "url";
import { StreamDeletingError, StreamError, StreamNotFoundError } from "./core/stream/stream.errors";
import type { StreamPosition } from "./core/stream/stream.types";
import { isSequenceNumber } from "./core/stream/stream.types";
import { InMemoryStream } from "./infrastructure/memory/InMemoryStream";
import { toWireRecordBatch } from "./infrastructure/stream-http/stream.wire";

/**
 * Stream service stand-in for local runs and tests: serves an InMemoryStream
 * over the REST API StreamHttpClient speaks. Resharding is exposed through the
 * split and merge routes.
 */
class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

type JsonBody = Record<string, unknown>;

const readJsonBody = async (req: http.IncomingMessage): Promise<JsonBody> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  if (chunks.length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new BadRequestError("Request body is not valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new BadRequestError("Request body must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
};

const requireString = (body: JsonBody, key: string): string => {
  const value = body[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new BadRequestError(`${key} must be a non-empty string`);
  }
  return value;
};

const parsePositionQuery = (url: URL): StreamPosition => {
  const after = url.searchParams.get("after");
  if (after != null) {
    if (!isSequenceNumber(after)) throw new BadRequestError("after must be a sequence number");
    return { kind: "after", sequenceNumber: after };
  }

  const position = url.searchParams.get("position") ?? "TRIM_HORIZON";
  if (position !== "LATEST" && position !== "TRIM_HORIZON") {
    throw new BadRequestError("position must be LATEST or TRIM_HORIZON");
  }
  return { kind: "initial", position };
};

const parseLimit = (url: URL): number => {
  const limit = Number(url.searchParams.get("limit") ?? "10000");
  if (!Number.isInteger(limit) || limit < 1) throw new BadRequestError("limit must be a positive integer");
  return limit;
};

const send = (res: http.ServerResponse, status: number, body?: unknown) => {
  if (body === undefined) {
    res.writeHead(status);
    res.end();
    return;
  }
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const route = async (stream: InMemoryStream, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
  const url = new URL(req.url ?? "/", "http://localhost");
  const segments = url.pathname.split("/").filter(Boolean).map(decodeURIComponent);
  const method = req.method ?? "GET";

  if (segments[0] !== "streams") {
    send(res, 404, { error: "not_found" });
    return;
  }

  const [, streamName, resource, shardId, action] = segments;

  if (streamName == null) {
    if (method === "GET") {
      send(res, 200, { streamNames: await stream.listStreams() });
      return;
    }
    if (method === "POST") {
      const body = await readJsonBody(req);
      const shardCount = body.shardCount;
      if (typeof shardCount !== "number" || !Number.isInteger(shardCount) || shardCount < 1) {
        throw new BadRequestError("shardCount must be a positive integer");
      }
      await stream.createStream(requireString(body, "streamName"), shardCount);
      send(res, 201);
      return;
    }
  }

  if (streamName != null && resource == null) {
    if (method === "GET") {
      send(res, 200, await stream.describeStream(streamName));
      return;
    }
    if (method === "DELETE") {
      await stream.deleteStream(streamName);
      send(res, 204);
      return;
    }
  }

  if (streamName != null && resource === "records" && method === "POST") {
    const body = await readJsonBody(req);
    const result = await stream.putRecord({
      streamName,
      partitionKey: requireString(body, "partitionKey"),
      data: new Uint8Array(Buffer.from(typeof body.data === "string" ? body.data : "", "base64"))
    });
    send(res, 200, result);
    return;
  }

  if (streamName != null && resource === "shards") {
    if (shardId == null && method === "GET") {
      send(res, 200, { shards: await stream.listShards(streamName) });
      return;
    }
    if (shardId === "merge" && action == null && method === "POST") {
      const body = await readJsonBody(req);
      stream.mergeShards(streamName, requireString(body, "shardId"), requireString(body, "adjacentShardId"));
      send(res, 200, { shards: await stream.listShards(streamName) });
      return;
    }
    if (shardId != null && action === "records" && method === "GET") {
      const batch = await stream.getRecords({
        streamName,
        shardId,
        position: parsePositionQuery(url),
        limit: parseLimit(url)
      });
      send(res, 200, toWireRecordBatch(batch));
      return;
    }
    if (shardId != null && action === "split" && method === "POST") {
      const body = await readJsonBody(req);
      const newStartingHashKey = typeof body.newStartingHashKey === "string" ? body.newStartingHashKey : undefined;
      stream.splitShard(streamName, shardId, newStartingHashKey);
      send(res, 200, { shards: await stream.listShards(streamName) });
      return;
    }
  }

  send(res, 404, { error: "not_found" });
};

export const createStreamServer = (stream: InMemoryStream = new InMemoryStream()) =>
  http.createServer((req, res) => {
    route(stream, req, res).catch((err: unknown) => {
      if (err instanceof StreamNotFoundError) {
        send(res, 404, { error: "not_found", message: err.message });
      } else if (err instanceof StreamDeletingError) {
        send(res, 409, { error: "stream_deleting", message: err.message });
      } else if (err instanceof BadRequestError || err instanceof StreamError) {
        send(res, 400, { error: "bad_request", message: err.message });
      } else {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({
          event: "fake_stream.error",
          message: err instanceof Error ? err.message : String(err)
        }));
        send(res, 500, { error: "internal" });
      }
    });
  });

if (require.main === module) {
  const port = Number(process.env.FAKE_STREAM_PORT ?? 4567);
  const server = createStreamServer();

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake stream service on http://localhost:${port}`);
  });
}
