import { Connection } from "./connection.js";
import { NoUsableNodeError, PoolExhaustedError, toErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { safeLog } from "./logger.js";
import type { ConnectionHook, ConnectionStatus } from "./types.js";

export interface ConnectionPoolOptions {
  onConnectionDead?: ConnectionHook;
  onConnectionAlive?: ConnectionHook;
  /** Receives hook failures and membership changes */
  errorLog?: Logger;
  infoLog?: Logger;
}

/**
 * Ordered set of connections with a round-robin selector.
 *
 * Every method is synchronous, so a caller always sees a consistent pool:
 * selection, liveness changes and replacement never interleave.
 * `replace` swaps in a new array rather than editing the current one.
 */
export class ConnectionPool {
  private conns: readonly Connection[];
  private cursor = 0;
  private readonly options: ConnectionPoolOptions;

  constructor(connections: Array<string | Connection>, options: ConnectionPoolOptions = {}) {
    if (!connections.length) {
      throw new NoUsableNodeError("ConnectionPool requires at least one connection.");
    }
    this.options = options;
    this.conns = dedupe(
      connections.map((c) => (typeof c === "string" ? new Connection(c) : c)),
    );
  }

  get size(): number {
    return this.conns.length;
  }

  /**
   * Snapshot of the current connections in selection order.
   */
  connections(): Connection[] {
    return [...this.conns];
  }

  urls(): string[] {
    return this.conns.map((c) => c.url);
  }

  /**
   * Return the next alive connection in round-robin order.
   *
   * Dead connections are skipped without consuming a turn. When every
   * connection is dead, all of them are marked alive and this one call
   * throws PoolExhaustedError.
   */
  select(): Connection {
    const count = this.conns.length;
    for (let scanned = 0; scanned < count; scanned++) {
      const index = (this.cursor + scanned) % count;
      const conn = this.conns[index];
      if (!conn.isDead()) {
        this.cursor = (index + 1) % count;
        return conn;
      }
    }

    this.resurrectAll();
    throw new PoolExhaustedError(count);
  }

  /**
   * Mark every connection alive. The cursor is left where it was.
   */
  resurrectAll(): void {
    for (const conn of this.conns) {
      this.markAlive(conn);
    }
  }

  hasAlive(): boolean {
    return this.conns.some((c) => !c.isDead());
  }

  markDead(conn: Connection): void {
    if (conn.markAsDead()) {
      this.notify(this.options.onConnectionDead, conn);
    }
  }

  markAlive(conn: Connection): void {
    if (conn.markAsAlive()) {
      this.notify(this.options.onConnectionAlive, conn);
    }
  }

  markHealthy(conn: Connection): void {
    if (conn.markAsHealthy()) {
      this.notify(this.options.onConnectionAlive, conn);
    }
  }

  /**
   * Replace the pool's membership.
   *
   * Connections whose URL is already pooled keep their liveness state and
   * take the incoming node id; new URLs join alive; missing URLs are
   * dropped. The cursor restarts at 0.
   * An empty list leaves the pool untouched and returns false.
   */
  replace(connections: Connection[]): boolean {
    if (!connections.length) {
      return false;
    }

    const existing = new Map(this.conns.map((c) => [c.url, c]));
    const next = dedupe(connections).map((conn) => {
      const current = existing.get(conn.url);
      if (current) {
        if (conn.nodeId !== undefined) {
          current.identify(conn.nodeId);
        }
        return current;
      }
      safeLog(this.options.infoLog, `${conn.url} joined the cluster`);
      return conn;
    });

    const kept = new Set(next.map((c) => c.url));
    for (const conn of this.conns) {
      if (!kept.has(conn.url)) {
        safeLog(this.options.infoLog, `${conn.url} left the cluster`);
      }
    }

    this.conns = next;
    this.cursor = 0;
    return true;
  }

  find(url: string): Connection | undefined {
    return this.conns.find((c) => c.url === url);
  }

  getStatus(): ConnectionStatus[] {
    return this.conns.map((c) => c.getStatus());
  }

  private notify(hook: ConnectionHook | undefined, conn: Connection): void {
    if (!hook) return;
    const status = conn.getStatus();
    // Fire and forget; a hook never blocks selection
    try {
      Promise.resolve(hook(status)).catch((error: unknown) => {
        safeLog(this.options.errorLog, `Connection hook failed for ${status.url}: ${toErrorMessage(error)}`);
      });
    } catch (error) {
      safeLog(this.options.errorLog, `Connection hook failed for ${status.url}: ${toErrorMessage(error)}`);
    }
  }
}

function dedupe(connections: Connection[]): Connection[] {
  const seen = new Set<string>();
  return connections.filter((conn) => {
    if (seen.has(conn.url)) return false;
    seen.add(conn.url);
    return true;
  });
}
