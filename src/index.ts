// SDK - resilient transport for a cluster of HTTP nodes
export {
  ClusterClient,
  ConnectionPool,
  Connection,
  createLogger,
  exponentialBackoff,
  silentLogger,
  ClusterClientError,
  ClusterClientErrorCodes,
  ConfigurationError,
  DiscoveryError,
  EncodingError,
  NoUsableNodeError,
  PoolExhaustedError,
  ResponseError,
  TransportError,
} from "./sdk/index.js";
export type {
  BackoffFn,
  BasicAuth,
  ClientOptions,
  ClusterResponse,
  ConnectionHook,
  ConnectionStatus,
  Logger,
  RequestOptions,
  Transport,
} from "./sdk/index.js";
