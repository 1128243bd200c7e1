import { ConfigurationError } from "./errors.js";
import type { ConnectionStatus } from "./types.js";

/**
 * Canonical form of a node URL: scheme, host, port and path prefix, without
 * trailing slash, credentials, query or fragment.
 */
export function normalizeUrl(raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new ConfigurationError(`Invalid node URL: ${raw}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`Unsupported scheme in node URL: ${raw}`);
  }
  const path = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.protocol}//${parsed.host}${path}`;
}

/**
 * A single cluster node endpoint and its liveness state.
 *
 * Liveness is only changed through the pool, which owns transition hooks.
 */
export class Connection {
  readonly url: string;
  private _nodeId?: string;
  private dead = false;
  private _deadSince: number | null = null;
  private _failures = 0;

  constructor(url: string, nodeId?: string) {
    this.url = normalizeUrl(url);
    this._nodeId = nodeId;
  }

  get nodeId(): string | undefined {
    return this._nodeId;
  }

  /** Record the id the cluster reports for this node. */
  identify(nodeId: string): void {
    this._nodeId = nodeId;
  }

  isDead(): boolean {
    return this.dead;
  }

  get deadSince(): number | null {
    return this._deadSince;
  }

  get failures(): number {
    return this._failures;
  }

  /** Returns true if the connection was alive before. */
  markAsDead(now = Date.now()): boolean {
    const wasAlive = !this.dead;
    this.dead = true;
    if (this._deadSince === null) {
      this._deadSince = now;
    }
    this._failures += 1;
    return wasAlive;
  }

  /** Returns true if the connection was dead before. */
  markAsAlive(): boolean {
    const wasDead = this.dead;
    this.dead = false;
    return wasDead;
  }

  /** Like markAsAlive, and also clears the failure history. */
  markAsHealthy(): boolean {
    const wasDead = this.markAsAlive();
    this._deadSince = null;
    this._failures = 0;
    return wasDead;
  }

  getStatus(): ConnectionStatus {
    return {
      url: this.url,
      nodeId: this._nodeId,
      alive: !this.dead,
      failures: this._failures,
      deadSince: this._deadSince,
    };
  }

  toString(): string {
    return `${this.url} [${this.dead ? "dead" : "alive"}]`;
  }
}
