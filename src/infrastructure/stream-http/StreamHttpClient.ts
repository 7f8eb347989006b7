import {
  StreamDeletingError,
  StreamError,
  StreamNotFoundError,
  ThrottledError,
  TransientStreamError
} from "../../core/stream/stream.errors";
import type { ShardDescriptor, StreamDescription } from "../../core/stream/stream.types";
import type { StreamAdmin } from "../../ports/StreamAdmin";
import type { GetRecordsParams, RecordBatch, StreamSource } from "../../ports/StreamSource";
import type { PutRecordParams, PutRecordResult, StreamWriter } from "../../ports/StreamWriter";
import {
  parsePutRecordResult,
  parseRecordBatch,
  parseShardList,
  parseStreamDescription,
  parseStreamNames
} from "./stream.wire";

type RequestSpec = {
  method: "GET" | "POST" | "DELETE";
  path: string[];
  query?: Record<string, string>;
  body?: unknown;
  context: { streamName?: string; shardId?: string };
};

const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header || !/^\d+$/.test(header)) return undefined;
  const seconds = Number(header);
  return Number.isSafeInteger(seconds) ? seconds * 1000 : undefined;
};

/**
 * Stream service client over its REST API, using native fetch (Node 20).
 * Each call is a single request; callers own the retry policy.
 */
export class StreamHttpClient implements StreamSource, StreamAdmin, StreamWriter {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 8000
  ) {}

  async listStreams(): Promise<string[]> {
    return parseStreamNames(await this.request({ method: "GET", path: ["streams"], context: {} }));
  }

  async createStream(streamName: string, shardCount: number): Promise<void> {
    await this.request({
      method: "POST",
      path: ["streams"],
      body: { streamName, shardCount },
      context: { streamName }
    });
  }

  async describeStream(streamName: string): Promise<StreamDescription> {
    return parseStreamDescription(
      await this.request({ method: "GET", path: ["streams", streamName], context: { streamName } })
    );
  }

  async deleteStream(streamName: string): Promise<void> {
    await this.request({ method: "DELETE", path: ["streams", streamName], context: { streamName } });
  }

  async listShards(streamName: string): Promise<ShardDescriptor[]> {
    return parseShardList(
      await this.request({ method: "GET", path: ["streams", streamName, "shards"], context: { streamName } })
    );
  }

  async getRecords(params: GetRecordsParams): Promise<RecordBatch> {
    const query: Record<string, string> = { limit: String(params.limit) };
    if (params.position.kind === "after") {
      query.after = params.position.sequenceNumber;
    } else {
      query.position = params.position.position;
    }

    const json = await this.request({
      method: "GET",
      path: ["streams", params.streamName, "shards", params.shardId, "records"],
      query,
      context: { streamName: params.streamName, shardId: params.shardId }
    });
    return parseRecordBatch(params.shardId, json);
  }

  async putRecord(params: PutRecordParams): Promise<PutRecordResult> {
    const json = await this.request({
      method: "POST",
      path: ["streams", params.streamName, "records"],
      body: {
        partitionKey: params.partitionKey,
        data: Buffer.from(params.data).toString("base64")
      },
      context: { streamName: params.streamName }
    });
    return parsePutRecordResult(json);
  }

  private buildUrl(spec: RequestSpec): URL {
    const url = new URL(this.baseUrl);
    const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${basePath}/${spec.path.map(encodeURIComponent).join("/")}`;
    for (const [key, value] of Object.entries(spec.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async request(spec: RequestSpec): Promise<unknown> {
    const url = this.buildUrl(spec);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(url.toString(), {
        method: spec.method,
        headers: spec.body !== undefined ? { "content-type": "application/json" } : undefined,
        body: spec.body !== undefined ? JSON.stringify(spec.body) : undefined,
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransientStreamError(`Stream request timeout after ${this.timeoutMs}ms`, spec.context, err);
      }
      throw new TransientStreamError(`Stream request failed: ${spec.method} ${url.pathname}`, spec.context, err);
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      throw this.toStreamError(res, spec);
    }

    if (res.status === 201 || res.status === 204) {
      await res.text().catch(() => "");
      return null;
    }
    return res.json();
  }

  private toStreamError(res: Response, spec: RequestSpec): StreamError {
    const context = { ...spec.context, status: res.status };
    const description = `${spec.method} ${this.buildUrl(spec).pathname} failed: ${res.status}`;

    if (res.status === 404) return new StreamNotFoundError(description, context);
    if (res.status === 409) return new StreamDeletingError(description, context);
    if (res.status === 429) {
      return new ThrottledError(description, context, parseRetryAfterMs(res.headers.get("retry-after")));
    }
    if (res.status >= 500) return new TransientStreamError(description, context);
    return new StreamError(description, context);
  }
}
