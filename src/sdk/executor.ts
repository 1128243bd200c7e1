import type { Connection } from "./connection.js";
import {
  EncodingError,
  PoolExhaustedError,
  ResponseError,
  TransportError,
  toErrorMessage,
} from "./errors.js";
import type { ResponseErrorDetails } from "./errors.js";
import type { HttpContext } from "./http.js";
import { buildHeaders, buildUrl, formatHeaders, resolveTransport } from "./http.js";
import type { Logger } from "./logger.js";
import { safeLog } from "./logger.js";
import type { ConnectionPool } from "./pool.js";
import { sleep } from "./retry.js";
import type { BackoffFn, ClusterResponse, RequestOptions } from "./types.js";

export interface RequestExecutorOptions {
  maxRetries: number;
  sendGetBodyAs: string;
  backoff?: BackoffFn;
  infoLog?: Logger;
  traceLog?: Logger;
  errorLog?: Logger;
}

type AttemptResult =
  | { ok: true; response: ClusterResponse }
  | { ok: false; error: unknown };

/**
 * Sends requests through the pool with failover on transport failures.
 *
 * A transport failure (no HTTP response) marks the node dead and moves on
 * to the next node, up to `maxRetries` extra attempts. A non-2xx response
 * is thrown as ResponseError right away and never retried.
 */
export class RequestExecutor {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly http: HttpContext,
    private readonly options: RequestExecutorOptions,
  ) {}

  async execute(request: RequestOptions): Promise<ClusterResponse> {
    const { signal } = request;
    const body = encodeBody(request.body);
    const method = resolveMethod(request.method, body, this.options.sendGetBodyAs);

    const maxAttempts = 1 + this.options.maxRetries;
    let lastError: unknown;
    let lastUrl = "";

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      if (attempt > 0 && this.options.backoff) {
        await sleep(this.options.backoff(attempt - 1), signal);
        if (signal?.aborted) {
          throw signal.reason;
        }
      }

      const conn = this.select(attempt);
      const url = buildUrl(conn.url, request.path, request.query);
      lastUrl = url;

      const result = await this.attempt(conn, method, url, body, request);
      if (result.ok) {
        this.pool.markAlive(conn);
        const { response } = result;
        if (response.statusCode >= 200 && response.statusCode < 300) {
          return response;
        }
        throw new ResponseError(response, parseErrorDetails(response.body));
      }

      if (signal?.aborted) {
        throw signal.reason;
      }
      lastError = result.error;
      this.pool.markDead(conn);
    }

    throw new TransportError(lastUrl, maxAttempts, lastError);
  }

  /**
   * Exhaustion before any node was tried is the caller's answer. Exhaustion
   * caused by this call's own failures re-selects from the resurrected pool
   * without spending an attempt.
   */
  private select(attempt: number): Connection {
    try {
      return this.pool.select();
    } catch (error) {
      if (attempt === 0 || !(error instanceof PoolExhaustedError)) {
        throw error;
      }
      return this.pool.select();
    }
  }

  private async attempt(
    conn: Connection,
    method: string,
    url: string,
    body: string | undefined,
    request: RequestOptions,
  ): Promise<AttemptResult> {
    const extra: Record<string, string> = { accept: "application/json", ...request.headers };
    if (body !== undefined && !hasHeader(extra, "content-type")) {
      extra["content-type"] = "application/json";
    }
    const headers = buildHeaders(this.http, extra);

    this.trace(`${method} ${url}\n${formatHeaders(headers)}${body !== undefined ? `\n\n${body}` : ""}`);

    const start = Date.now();
    try {
      const res = await resolveTransport(this.http)(url, {
        method,
        headers,
        body,
        signal: request.signal,
      });
      const text = await res.text();
      const elapsedMs = Date.now() - start;

      const response: ClusterResponse = {
        statusCode: res.status,
        headers: res.headers,
        body: text,
        url,
      };

      this.info(`${method} ${url} [status:${res.status}, request:${(elapsedMs / 1000).toFixed(3)}s]`);
      this.trace(`HTTP ${res.status} ${url}\n${formatHeaders(res.headers)}${text ? `\n\n${text}` : ""}`);
      return { ok: true, response };
    } catch (error) {
      const elapsedMs = Date.now() - start;
      this.info(`${method} ${url} [error:${toErrorMessage(error)}, request:${(elapsedMs / 1000).toFixed(3)}s]`);
      return { ok: false, error };
    }
  }

  private info(message: string): void {
    if (!safeLog(this.options.infoLog, message)) {
      safeLog(this.options.errorLog, "Info logger threw; line dropped");
    }
  }

  private trace(message: string): void {
    if (!safeLog(this.options.traceLog, message)) {
      safeLog(this.options.errorLog, "Trace logger threw; line dropped");
    }
  }
}

/**
 * Strings are sent as-is; anything else, `null` included, is JSON-encoded.
 */
export function encodeBody(body: unknown): string | undefined {
  if (body === undefined) return undefined;
  if (typeof body === "string") return body;

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(body);
  } catch (error) {
    throw new EncodingError(error);
  }
  if (encoded === undefined) {
    throw new EncodingError(`value of type ${typeof body} has no JSON form`);
  }
  return encoded;
}

function resolveMethod(method: string, body: string | undefined, sendGetBodyAs: string): string {
  const upper = method.toUpperCase();
  if (upper === "GET" && body !== undefined) {
    return sendGetBodyAs;
  }
  return upper;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name);
}

/**
 * Read `{ error: { type, reason } }` or `{ error: "..." }` from a failing
 * response body.
 */
export function parseErrorDetails(body: string): ResponseErrorDetails | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!payload || typeof payload !== "object" || !("error" in payload)) {
    return undefined;
  }

  const { error } = payload;
  if (typeof error === "string") {
    return { reason: error };
  }
  if (error && typeof error === "object") {
    const details: ResponseErrorDetails = {};
    if ("type" in error && typeof error.type === "string") details.type = error.type;
    if ("reason" in error && typeof error.reason === "string") details.reason = error.reason;
    return details;
  }
  return undefined;
}
