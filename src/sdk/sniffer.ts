import { Connection } from "./connection.js";
import { DiscoveryError, NoUsableNodeError, toErrorMessage } from "./errors.js";
import type { HttpContext } from "./http.js";
import { buildHeaders, buildUrl, resolveTransport } from "./http.js";
import type { Logger } from "./logger.js";
import { safeLog } from "./logger.js";
import type { ConnectionPool } from "./pool.js";
import { retryUntilDeadline, sleep, withTimeout } from "./retry.js";

/** Cluster endpoint that lists every member with its HTTP address. */
export const NODES_INFO_PATH = "/_nodes/http";

/** Pause between discovery attempts while the client starts up. */
export const STARTUP_RETRY_PAUSE_MS = 1_000;

export interface SnifferOptions {
  seeds: readonly string[];
  scheme: "http" | "https";
  timeoutMs: number;
  startupTimeoutMs: number;
  intervalMs: number;
  infoLog?: Logger;
  errorLog?: Logger;
}

/**
 * Keeps the pool's membership in line with what the cluster reports.
 */
export class Sniffer {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly http: HttpContext,
    private readonly options: SnifferOptions,
  ) {}

  /**
   * Ask one node for the cluster's member list.
   */
  async discover(seedUrl: string, signal?: AbortSignal): Promise<Connection[]> {
    const url = buildUrl(seedUrl, NODES_INFO_PATH);
    const transport = resolveTransport(this.http);

    const response = await transport(url, {
      method: "GET",
      headers: buildHeaders(this.http, { accept: "application/json" }),
      signal,
    });
    const text = await response.text();

    if (!response.ok) {
      throw new DiscoveryError(seedUrl, `HTTP ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new DiscoveryError(seedUrl, "response is not JSON", error);
    }

    const connections = parseNodesInfo(payload, this.options.scheme);
    if (connections === undefined) {
      throw new DiscoveryError(seedUrl, "response has no nodes object");
    }
    if (!connections.length) {
      throw new DiscoveryError(seedUrl, "no node exposes an HTTP address");
    }
    return connections;
  }

  /**
   * One discovery pass: try the pooled URLs, then the seeds, and replace the
   * pool with the first member list obtained.
   */
  async sniff(timeoutMs: number, signal?: AbortSignal): Promise<Connection[]> {
    const candidates = [...this.pool.urls()];
    for (const seed of this.options.seeds) {
      if (!candidates.includes(seed)) {
        candidates.push(seed);
      }
    }

    for (const candidate of candidates) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      const scoped = withTimeout(timeoutMs, signal);
      try {
        const connections = await this.discover(candidate, scoped.signal);
        this.pool.replace(connections);
        safeLog(this.options.infoLog, `Discovered ${connections.length} node(s) via ${candidate}`);
        return connections;
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        safeLog(
          this.options.errorLog,
          error instanceof DiscoveryError
            ? error.message
            : `Discovery via ${candidate} failed: ${toErrorMessage(error)}`,
        );
      } finally {
        scoped.release();
      }
    }

    throw new NoUsableNodeError(
      `No cluster node returned a member list (tried ${candidates.join(", ")})`,
    );
  }

  /**
   * Keep sniffing until a pass succeeds or the startup budget is spent.
   */
  async sniffOnStartup(signal?: AbortSignal): Promise<Connection[]> {
    const connections = await retryUntilDeadline(
      this.options.startupTimeoutMs,
      STARTUP_RETRY_PAUSE_MS,
      async (remainingMs) => {
        try {
          return await this.sniff(remainingMs, signal);
        } catch (error) {
          if (signal?.aborted) throw error;
          return undefined;
        }
      },
      signal,
    );

    if (!connections) {
      throw new NoUsableNodeError();
    }
    return connections;
  }

  /**
   * Periodic driver. Resolves once `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.options.intervalMs, signal, true);
      if (signal.aborted) return;

      try {
        await this.sniff(this.options.timeoutMs, signal);
      } catch (error) {
        if (signal.aborted) return;
        safeLog(this.options.errorLog, `Discovery failed: ${toErrorMessage(error)}`);
      }
    }
  }
}

/**
 * Turn a nodes-info document into connections. Returns undefined when the
 * document has no `nodes` object; nodes without a usable address are
 * skipped.
 */
export function parseNodesInfo(
  payload: unknown,
  scheme: "http" | "https",
): Connection[] | undefined {
  if (!isRecord(payload) || !isRecord(payload.nodes)) {
    return undefined;
  }

  const connections: Connection[] = [];
  for (const [nodeId, node] of Object.entries(payload.nodes)) {
    if (!isRecord(node)) continue;

    const address = extractHttpAddress(node);
    if (!address) continue;

    const url = addressToUrl(address, scheme);
    if (url) {
      connections.push(new Connection(url, nodeId));
    }
  }
  return connections;
}

function extractHttpAddress(node: Record<string, unknown>): string | undefined {
  if (isRecord(node.http) && typeof node.http.publish_address === "string") {
    return node.http.publish_address;
  }
  if (typeof node.http_address === "string") {
    return node.http_address;
  }
  return undefined;
}

/**
 * Accepts `host:port`, `hostname/ip:port` and the legacy `inet[/ip:port]`.
 */
export function addressToUrl(address: string, scheme: "http" | "https"): string | undefined {
  let value = address.trim();

  const legacy = /^inet\[(.*)\]$/.exec(value);
  if (legacy) {
    value = legacy[1];
  }

  const slash = value.lastIndexOf("/");
  if (slash !== -1) {
    value = value.slice(slash + 1);
  }
  if (!/:\d+$/.test(value)) return undefined;

  try {
    const parsed = new URL(`${scheme}://${value}`);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
