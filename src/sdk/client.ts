import { normalizeUrl } from "./connection.js";
import { ConfigurationError, NoUsableNodeError } from "./errors.js";
import { RequestExecutor } from "./executor.js";
import { HealthChecker } from "./healthcheck.js";
import type { HttpContext } from "./http.js";
import { safeLog } from "./logger.js";
import { ConnectionPool } from "./pool.js";
import { Sniffer } from "./sniffer.js";
import type {
  ClientOptions,
  ClusterResponse,
  ConnectionStatus,
  RequestOptions,
  ResolvedClientOptions,
} from "./types.js";

export const DEFAULT_URL = "http://127.0.0.1:9200";

export const DEFAULT_OPTIONS = {
  urls: [DEFAULT_URL],
  sniff: true,
  snifferTimeoutStartupMs: 5_000,
  snifferTimeoutMs: 2_000,
  snifferIntervalMs: 15 * 60_000,
  scheme: "http",
  healthcheck: true,
  healthcheckTimeoutStartupMs: 5_000,
  healthcheckTimeoutMs: 1_000,
  healthcheckIntervalMs: 60_000,
  maxRetries: 0,
  sendGetBodyAs: "GET",
} as const satisfies Partial<ResolvedClientOptions>;

/**
 * Client for a cluster of interchangeable HTTP nodes.
 *
 * Keeps a pool of nodes up to date through discovery and health probes,
 * and sends each request to the next live node, failing over on transport
 * errors.
 *
 * @example
 * ```ts
 * const client = await ClusterClient.create({
 *   urls: ["http://10.0.0.1:9200", "http://10.0.0.2:9200"],
 *   maxRetries: 2,
 *   infoLog: createLogger(),
 * });
 *
 * const res = await client.performRequest({ method: "GET", path: "/_cluster/health" });
 * console.log(JSON.parse(res.body));
 *
 * await client.stop();
 * ```
 */
export class ClusterClient {
  readonly options: ResolvedClientOptions;
  private readonly pool: ConnectionPool;
  private readonly sniffer: Sniffer;
  private readonly healthChecker: HealthChecker;
  private readonly executor: RequestExecutor;

  private running = false;
  private abortController?: AbortController;
  private tasks: Promise<void>[] = [];

  /**
   * Validate options and seed the pool. Nothing is contacted and no
   * background task runs until `initialize()` / `start()`; use
   * `ClusterClient.create()` for both.
   */
  constructor(options: ClientOptions = {}) {
    this.options = resolveOptions(options);

    const { infoLog, errorLog, onConnectionDead, onConnectionAlive } = this.options;
    this.pool = new ConnectionPool([...this.options.urls], {
      infoLog,
      errorLog,
      onConnectionDead,
      onConnectionAlive,
    });

    const http: HttpContext = {
      transport: this.options.transport,
      basicAuth: this.options.basicAuth,
      headers: this.options.headers,
    };

    this.sniffer = new Sniffer(this.pool, http, {
      seeds: this.options.urls,
      scheme: this.options.scheme,
      timeoutMs: this.options.snifferTimeoutMs,
      startupTimeoutMs: this.options.snifferTimeoutStartupMs,
      intervalMs: this.options.snifferIntervalMs,
      infoLog,
      errorLog,
    });

    this.healthChecker = new HealthChecker(this.pool, http, {
      timeoutMs: this.options.healthcheckTimeoutMs,
      startupTimeoutMs: this.options.healthcheckTimeoutStartupMs,
      intervalMs: this.options.healthcheckIntervalMs,
      errorLog,
    });

    this.executor = new RequestExecutor(this.pool, http, {
      maxRetries: this.options.maxRetries,
      sendGetBodyAs: this.options.sendGetBodyAs,
      backoff: this.options.backoff,
      infoLog,
      traceLog: this.options.traceLog,
      errorLog,
    });
  }

  /**
   * Create a client, wait until the cluster is usable and start the
   * background tasks. Rejects with NoUsableNodeError when no node can be
   * reached within the startup budgets.
   */
  static async create(options: ClientOptions = {}): Promise<ClusterClient> {
    const client = new ClusterClient(options);
    await client.initialize();
    client.start();
    return client;
  }

  /**
   * Startup sequence: wait for a responding seed, discover members, probe
   * them all, then require at least one live node.
   */
  async initialize(signal?: AbortSignal): Promise<void> {
    if (this.options.healthcheck) {
      await this.healthChecker.waitForHealthyNode(signal);
    }

    if (this.options.sniff) {
      await this.sniffer.sniffOnStartup(signal);
    }

    if (this.options.healthcheck) {
      await this.healthChecker.healthcheck(this.options.healthcheckTimeoutStartupMs, signal);
    }

    signal?.throwIfAborted();
    if (!this.pool.hasAlive()) {
      throw new NoUsableNodeError();
    }
  }

  /**
   * Send a request to the next live node.
   *
   * Rejects with ResponseError for non-2xx answers (response attached),
   * TransportError once every attempt failed below HTTP, PoolExhaustedError
   * when the pool had no live node, EncodingError for bodies without a JSON
   * form, and with the signal's reason when `signal` aborts.
   */
  performRequest(request: RequestOptions): Promise<ClusterResponse> {
    return this.executor.execute(request);
  }

  /**
   * Launch the enabled background tasks. No-op while running.
   */
  start(): void {
    if (this.running) return;

    const controller = new AbortController();
    this.abortController = controller;
    this.tasks = [];

    if (this.options.sniff) {
      this.tasks.push(this.sniffer.run(controller.signal));
    }
    if (this.options.healthcheck) {
      this.tasks.push(this.healthChecker.run(controller.signal));
    }

    this.running = true;
    safeLog(this.options.infoLog, "Background tasks started");
  }

  /**
   * Cancel the background tasks, including any in-flight discovery or
   * probe, and wait for them to finish. No-op while stopped.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    const tasks = this.tasks;
    this.tasks = [];
    this.abortController?.abort();
    this.abortController = undefined;

    await Promise.all(tasks);
    safeLog(this.options.infoLog, "Background tasks stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one discovery pass now.
   */
  async sniff(signal?: AbortSignal): Promise<void> {
    await this.sniffer.sniff(this.options.snifferTimeoutMs, signal);
  }

  /**
   * Run one health check pass now.
   */
  healthcheck(signal?: AbortSignal): Promise<void> {
    return this.healthChecker.healthcheck(this.options.healthcheckTimeoutMs, signal);
  }

  /**
   * Get status of all pooled connections, in selection order.
   */
  getStatus(): ConnectionStatus[] {
    return this.pool.getStatus();
  }

  /**
   * Direct access to the shared pool.
   */
  getPool(): ConnectionPool {
    return this.pool;
  }

  getSniffer(): Sniffer {
    return this.sniffer;
  }

  getHealthChecker(): HealthChecker {
    return this.healthChecker;
  }
}

/**
 * Apply defaults, validate and freeze.
 */
export function resolveOptions(options: ClientOptions): ResolvedClientOptions {
  const defaults = DEFAULT_OPTIONS;
  const seeds: readonly string[] = options.urls ?? defaults.urls;
  const headers: Record<string, string> = { ...options.headers };
  const resolved = {
    ...options,
    sniff: options.sniff ?? defaults.sniff,
    snifferTimeoutStartupMs: options.snifferTimeoutStartupMs ?? defaults.snifferTimeoutStartupMs,
    snifferTimeoutMs: options.snifferTimeoutMs ?? defaults.snifferTimeoutMs,
    snifferIntervalMs: options.snifferIntervalMs ?? defaults.snifferIntervalMs,
    scheme: options.scheme ?? defaults.scheme,
    healthcheck: options.healthcheck ?? defaults.healthcheck,
    healthcheckTimeoutStartupMs:
      options.healthcheckTimeoutStartupMs ?? defaults.healthcheckTimeoutStartupMs,
    healthcheckTimeoutMs: options.healthcheckTimeoutMs ?? defaults.healthcheckTimeoutMs,
    healthcheckIntervalMs: options.healthcheckIntervalMs ?? defaults.healthcheckIntervalMs,
    maxRetries: options.maxRetries ?? defaults.maxRetries,
    sendGetBodyAs: options.sendGetBodyAs ?? defaults.sendGetBodyAs,
  };

  const urls = seeds.map((url) => normalizeUrl(url));
  if (!urls.length) {
    throw new ConfigurationError("At least one node URL is required.");
  }

  for (const key of [
    "snifferTimeoutStartupMs",
    "snifferTimeoutMs",
    "snifferIntervalMs",
    "healthcheckTimeoutStartupMs",
    "healthcheckTimeoutMs",
    "healthcheckIntervalMs",
  ] as const) {
    const value = resolved[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${key} must be a positive number, got ${value}.`);
    }
  }

  if (!Number.isInteger(resolved.maxRetries) || resolved.maxRetries < 0) {
    throw new ConfigurationError(
      `maxRetries must be a non-negative integer, got ${resolved.maxRetries}.`,
    );
  }
  if (resolved.scheme !== "http" && resolved.scheme !== "https") {
    throw new ConfigurationError(`scheme must be "http" or "https", got ${String(resolved.scheme)}.`);
  }
  if (!resolved.sendGetBodyAs.trim()) {
    throw new ConfigurationError("sendGetBodyAs must be an HTTP method.");
  }
  if (resolved.basicAuth && !resolved.basicAuth.username) {
    throw new ConfigurationError("basicAuth requires a username.");
  }

  return Object.freeze({
    ...resolved,
    urls: Object.freeze([...new Set(urls)]),
    headers: Object.freeze(headers),
    sendGetBodyAs: resolved.sendGetBodyAs.trim().toUpperCase(),
    basicAuth: resolved.basicAuth ? Object.freeze({ ...resolved.basicAuth }) : undefined,
  });
}
