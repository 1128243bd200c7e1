/**
 * Probes every pooled node and records whether it answers.
 */

import type { Connection } from "./connection.js";
import { NoUsableNodeError, toErrorMessage } from "./errors.js";
import type { HttpContext } from "./http.js";
import { buildHeaders, buildUrl, resolveTransport } from "./http.js";
import type { Logger } from "./logger.js";
import { safeLog } from "./logger.js";
import type { ConnectionPool } from "./pool.js";
import { retryUntilDeadline, sleep, withTimeout } from "./retry.js";
import { STARTUP_RETRY_PAUSE_MS } from "./sniffer.js";

export interface HealthCheckerOptions {
  timeoutMs: number;
  startupTimeoutMs: number;
  intervalMs: number;
  errorLog?: Logger;
}

export class HealthChecker {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly http: HttpContext,
    private readonly options: HealthCheckerOptions,
  ) {}

  /**
   * Probe a single node. Any 2xx answer within the timeout means alive.
   */
  async check(
    conn: Pick<Connection, "url">,
    signal?: AbortSignal,
    timeoutMs = this.options.timeoutMs,
  ): Promise<boolean> {
    const scoped = withTimeout(timeoutMs, signal);
    try {
      const response = await resolveTransport(this.http)(buildUrl(conn.url, "/"), {
        method: "HEAD",
        headers: buildHeaders(this.http),
        signal: scoped.signal,
      });
      await response.arrayBuffer();
      return response.ok;
    } catch {
      return false;
    } finally {
      scoped.release();
    }
  }

  /**
   * Probe every pooled node concurrently and update its liveness.
   * Probes cut short by `signal` leave the node's state unchanged.
   */
  async healthcheck(timeoutMs = this.options.timeoutMs, signal?: AbortSignal): Promise<void> {
    const connections = this.pool.connections();

    await Promise.all(
      connections.map(async (conn) => {
        const alive = await this.check(conn, signal, timeoutMs);
        if (signal?.aborted) return;
        if (alive) {
          this.pool.markHealthy(conn);
        } else {
          this.pool.markDead(conn);
        }
      }),
    );
  }

  /**
   * Wait until at least one pooled node answers a probe, or fail once the
   * startup budget is spent. Resolves with the URL of the first responder.
   */
  async waitForHealthyNode(signal?: AbortSignal): Promise<string> {
    const connections = this.pool.connections();

    const found = await retryUntilDeadline(
      this.options.startupTimeoutMs,
      STARTUP_RETRY_PAUSE_MS,
      async (remainingMs) => {
        const results = await Promise.all(
          connections.map(async (conn) =>
            (await this.check(conn, signal, remainingMs)) ? conn.url : undefined,
          ),
        );
        return results.find((url) => url !== undefined);
      },
      signal,
    );

    if (!found) {
      throw new NoUsableNodeError(
        `No cluster node answered a health probe within ${this.options.startupTimeoutMs}ms`,
      );
    }
    return found;
  }

  /**
   * Periodic driver. Resolves once `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.options.intervalMs, signal, true);
      if (signal.aborted) return;

      try {
        await this.healthcheck(this.options.timeoutMs, signal);
      } catch (error) {
        if (signal.aborted) return;
        safeLog(this.options.errorLog, `Health check failed: ${toErrorMessage(error)}`);
      }
    }
  }
}
