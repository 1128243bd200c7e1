export { ClusterClient, DEFAULT_OPTIONS, DEFAULT_URL, resolveOptions } from "./client.js";
export { Connection, normalizeUrl } from "./connection.js";
export { ConnectionPool } from "./pool.js";
export { Sniffer, NODES_INFO_PATH, parseNodesInfo, addressToUrl } from "./sniffer.js";
export { HealthChecker } from "./healthcheck.js";
export { RequestExecutor, encodeBody, parseErrorDetails } from "./executor.js";
export { exponentialBackoff } from "./retry.js";
export { createLogger, silentLogger } from "./logger.js";
export {
  ClusterClientError,
  ClusterClientErrorCodes,
  ConfigurationError,
  DiscoveryError,
  EncodingError,
  NoUsableNodeError,
  PoolExhaustedError,
  ResponseError,
  TransportError,
} from "./errors.js";
export type { ClusterClientErrorCode, ResponseErrorDetails } from "./errors.js";
export type { Logger } from "./logger.js";
export type { ExponentialBackoffConfig } from "./retry.js";
export type { ConnectionPoolOptions } from "./pool.js";
export type { SnifferOptions } from "./sniffer.js";
export type { HealthCheckerOptions } from "./healthcheck.js";
export type { RequestExecutorOptions } from "./executor.js";
export type {
  BackoffFn,
  BasicAuth,
  ClientOptions,
  ClusterResponse,
  ConnectionHook,
  ConnectionStatus,
  QueryValue,
  RequestOptions,
  ResolvedClientOptions,
  Transport,
} from "./types.js";
