/**
 * Logger capability accepted by the client for info, trace and error output.
 *
 * Anything with a `log(message)` method qualifies, so `console` can be
 * passed directly.
 */
export interface Logger {
  log(message: string): void;
}

/**
 * Create a console logger that stamps each line with an ISO timestamp.
 *
 * @example
 * ```ts
 * const client = await ClusterClient.create({
 *   infoLog: createLogger("[cluster]"),
 * });
 * // 2026-01-21T12:00:00.000Z [cluster] GET http://127.0.0.1:9200/ [status:200, request:0.004s]
 * ```
 */
export function createLogger(prefix = "[cluster-transport]"): Logger {
  return {
    log: (message) => {
      console.log(`${new Date().toISOString()} ${prefix} ${message}`);
    },
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  log: () => {},
};

/**
 * Write to a logger without letting a logger failure escape.
 * Returns false when the logger threw.
 */
export function safeLog(logger: Logger | undefined, message: string): boolean {
  if (!logger) return true;
  try {
    logger.log(message);
    return true;
  } catch {
    return false;
  }
}
