import type { Logger } from "./logger.js";

/**
 * Function with the signature of `fetch`, used to send every HTTP call.
 */
export type Transport = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Credentials sent as an `Authorization: Basic` header.
 */
export interface BasicAuth {
  username: string;
  password: string;
}

/**
 * Delay in milliseconds before retry number `attempt` (0-based).
 */
export type BackoffFn = (attempt: number) => number;

/**
 * Called on liveness transitions of a connection.
 */
export type ConnectionHook = (status: ConnectionStatus) => void | Promise<void>;

/**
 * Options for ClusterClient.
 */
export interface ClientOptions {
  /** Seed node URLs (default: ["http://127.0.0.1:9200"]) */
  urls?: string[];
  /** Discover cluster members from the seeds and refresh them periodically (default: true) */
  sniff?: boolean;
  /** Time budget for discovery while the client is created (default: 5000) */
  snifferTimeoutStartupMs?: number;
  /** Timeout of each periodic discovery call (default: 2000) */
  snifferTimeoutMs?: number;
  /** Interval between periodic discovery passes (default: 15 minutes) */
  snifferIntervalMs?: number;
  /** Scheme used for discovered node addresses (default: "http") */
  scheme?: "http" | "https";
  /** Probe node liveness at startup and periodically (default: true) */
  healthcheck?: boolean;
  /** Time budget for the first successful probe while the client is created (default: 5000) */
  healthcheckTimeoutStartupMs?: number;
  /** Timeout of each periodic probe (default: 1000) */
  healthcheckTimeoutMs?: number;
  /** Interval between periodic probe passes (default: 60000) */
  healthcheckIntervalMs?: number;
  /** Extra attempts after a transport failure (default: 0) */
  maxRetries?: number;
  /** Delay between retries; no delay when unset */
  backoff?: BackoffFn;
  /** Basic auth credentials for requests, probes and discovery */
  basicAuth?: BasicAuth;
  /** HTTP transport (default: global fetch) */
  transport?: Transport;
  /** Headers added to every request */
  headers?: Record<string, string>;
  /** Receives one line per completed request */
  infoLog?: Logger;
  /** Receives full request and response dumps */
  traceLog?: Logger;
  /** Receives background task failures */
  errorLog?: Logger;
  /** Method used to send GET requests that carry a body (default: "GET") */
  sendGetBodyAs?: string;
  /** Called when a connection goes from alive to dead */
  onConnectionDead?: ConnectionHook;
  /** Called when a connection goes from dead to alive */
  onConnectionAlive?: ConnectionHook;
}

type UndefaultedOption =
  | "backoff"
  | "basicAuth"
  | "transport"
  | "infoLog"
  | "traceLog"
  | "errorLog"
  | "onConnectionDead"
  | "onConnectionAlive";

/**
 * Options after defaults have been applied.
 */
export type ResolvedClientOptions = Readonly<
  Required<Omit<ClientOptions, UndefaultedOption | "urls" | "headers">> &
    Pick<ClientOptions, UndefaultedOption> & {
      urls: readonly string[];
      headers: Readonly<Record<string, string>>;
    }
>;

/**
 * Status information for a connection.
 */
export interface ConnectionStatus {
  url: string;
  nodeId?: string;
  alive: boolean;
  failures: number;
  deadSince: number | null;
}

export type QueryValue = string | number | boolean | undefined;

/**
 * A single call issued through the pool.
 */
export interface RequestOptions {
  method: string;
  /** Path relative to the node URL, e.g. "/_cluster/health" */
  path: string;
  query?: Record<string, QueryValue> | URLSearchParams;
  /** Strings are sent as-is; anything else is JSON-encoded */
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Response of a node, with the body read as text.
 */
export interface ClusterResponse {
  statusCode: number;
  headers: Headers;
  body: string;
  /** Full URL the request was sent to */
  url: string;
}
