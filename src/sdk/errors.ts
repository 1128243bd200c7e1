import type { ClusterResponse } from "./types.js";

/**
 * String codes carried by every error the client raises.
 */
export const ClusterClientErrorCodes = {
  /** No node could be reached while the client was being created */
  NO_USABLE_NODE: "NO_USABLE_NODE",
  /** Every connection in the pool was dead; the pool has been resurrected */
  POOL_EXHAUSTED: "POOL_EXHAUSTED",
  /** No HTTP response could be obtained within the retry budget */
  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  /** A node answered with a non-2xx status */
  HTTP_ERROR: "HTTP_ERROR",
  /** The request body could not be serialized */
  ENCODING_ERROR: "ENCODING_ERROR",
  /** A node returned an unusable member list */
  DISCOVERY_FAILED: "DISCOVERY_FAILED",
  /** Client options failed validation */
  INVALID_OPTIONS: "INVALID_OPTIONS",
} as const;

export type ClusterClientErrorCode =
  (typeof ClusterClientErrorCodes)[keyof typeof ClusterClientErrorCodes];

/**
 * Base class for errors raised by the client.
 */
export class ClusterClientError extends Error {
  public readonly code: ClusterClientErrorCode;

  constructor(message: string, code: ClusterClientErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClusterClientError";
    this.code = code;
  }
}

export class NoUsableNodeError extends ClusterClientError {
  constructor(message = "No cluster node available") {
    super(message, ClusterClientErrorCodes.NO_USABLE_NODE);
    this.name = "NoUsableNodeError";
  }
}

/**
 * Thrown by the selector for the one call that found every connection dead.
 * All connections are alive again by the time the caller sees it.
 */
export class PoolExhaustedError extends ClusterClientError {
  public readonly poolSize: number;

  constructor(poolSize: number) {
    super(
      `All ${poolSize} connection(s) are dead; pool resurrected`,
      ClusterClientErrorCodes.POOL_EXHAUSTED,
    );
    this.name = "PoolExhaustedError";
    this.poolSize = poolSize;
  }
}

/**
 * No HTTP response was obtained after every attempt. `cause` holds the
 * error of the last attempt.
 */
export class TransportError extends ClusterClientError {
  public readonly url: string;
  public readonly attempts: number;

  constructor(url: string, attempts: number, cause: unknown) {
    super(
      `Request to ${url} failed after ${attempts} attempt(s): ${toErrorMessage(cause)}`,
      ClusterClientErrorCodes.TRANSPORT_ERROR,
      { cause },
    );
    this.name = "TransportError";
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * Error document a node may return alongside a failing status.
 */
export interface ResponseErrorDetails {
  type?: string;
  reason?: string;
}

/**
 * A node answered, but with a non-2xx status. The response is attached.
 */
export class ResponseError extends ClusterClientError {
  public readonly response: ClusterResponse;
  public readonly status: number;
  public readonly details?: ResponseErrorDetails;

  constructor(response: ClusterResponse, details?: ResponseErrorDetails) {
    const summary = details?.reason
      ? `${details.type ?? "error"}: ${details.reason}`
      : `HTTP ${response.statusCode}`;
    super(
      `Request to ${response.url} returned ${response.statusCode} (${summary})`,
      ClusterClientErrorCodes.HTTP_ERROR,
    );
    this.name = "ResponseError";
    this.response = response;
    this.status = response.statusCode;
    this.details = details;
  }
}

export class EncodingError extends ClusterClientError {
  constructor(cause: unknown) {
    super(
      `Failed to encode request body: ${toErrorMessage(cause)}`,
      ClusterClientErrorCodes.ENCODING_ERROR,
      { cause },
    );
    this.name = "EncodingError";
  }
}

export class DiscoveryError extends ClusterClientError {
  public readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super(`Discovery via ${url} failed: ${message}`, ClusterClientErrorCodes.DISCOVERY_FAILED, {
      cause,
    });
    this.name = "DiscoveryError";
    this.url = url;
  }
}

export class ConfigurationError extends ClusterClientError {
  constructor(message: string) {
    super(message, ClusterClientErrorCodes.INVALID_OPTIONS);
    this.name = "ConfigurationError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
