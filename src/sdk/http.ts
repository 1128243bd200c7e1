import type { BasicAuth, QueryValue, Transport } from "./types.js";

export const VERSION = "1.0.0";
export const USER_AGENT = `cluster-transport/${VERSION} (node ${process.version})`;

/**
 * What every outgoing call needs besides its own method, path and body.
 */
export interface HttpContext {
  transport?: Transport;
  basicAuth?: BasicAuth;
  headers: Readonly<Record<string, string>>;
}

/**
 * Resolve the transport at call time so a replaced global fetch is honored.
 */
export function resolveTransport(ctx: HttpContext): Transport {
  return ctx.transport ?? ((input, init) => fetch(input, init));
}

export function basicAuthHeader(auth: BasicAuth): string {
  const token = Buffer.from(`${auth.username}:${auth.password}`, "utf8").toString("base64");
  return `Basic ${token}`;
}

/**
 * Headers for a call: defaults, then per-call headers, then credentials.
 */
export function buildHeaders(ctx: HttpContext, extra?: Record<string, string>): Headers {
  const headers = new Headers();
  headers.set("user-agent", USER_AGENT);

  for (const [key, value] of Object.entries(ctx.headers)) {
    headers.set(key, value);
  }
  if (extra) {
    for (const [key, value] of Object.entries(extra)) {
      headers.set(key, value);
    }
  }
  if (ctx.basicAuth) {
    headers.set("authorization", basicAuthHeader(ctx.basicAuth));
  }

  return headers;
}

/**
 * Join a node base URL, a path and query parameters. Undefined query values
 * are dropped.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: Record<string, QueryValue> | URLSearchParams,
): string {
  const suffix = path.startsWith("/") ? path : `/${path}`;
  let url = `${baseUrl}${suffix}`;

  const params = new URLSearchParams();
  if (query instanceof URLSearchParams) {
    for (const [key, value] of query.entries()) {
      params.append(key, value);
    }
  } else if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
  }

  const qs = params.toString();
  if (qs) {
    url += `?${qs}`;
  }
  return url;
}

/**
 * Flatten a Headers object for log output.
 */
export function formatHeaders(headers: Headers): string {
  const lines: string[] = [];
  headers.forEach((value, key) => {
    lines.push(`${key}: ${key === "authorization" ? "<redacted>" : value}`);
  });
  return lines.join("\n");
}
