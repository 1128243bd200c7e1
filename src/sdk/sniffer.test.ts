import { jest, describe, it, expect } from "@jest/globals";
import { NoUsableNodeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { ConnectionPool } from "./pool.js";
import { Sniffer, addressToUrl, parseNodesInfo } from "./sniffer.js";
import type { SnifferOptions } from "./sniffer.js";
import {
  jsonResponse,
  nodesInfo,
  startFakeNode,
  startHangingNode,
  unusedUrl,
  waitFor,
} from "./test-utils.js";
import type { Transport } from "./types.js";

type MockTransport = jest.Mock<Transport>;

const SEED = "http://127.0.0.1:9200";
const OTHER = "http://127.0.0.1:9201";

function capture(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return { lines, log: (m) => lines.push(m) };
}

function setup(
  urls: string[],
  transport?: MockTransport,
  options: Partial<SnifferOptions> = {},
) {
  const pool = new ConnectionPool(urls);
  const errorLog = capture();
  const infoLog = capture();
  const sniffer = new Sniffer(
    pool,
    { headers: {}, transport },
    {
      seeds: urls,
      scheme: "http",
      timeoutMs: 1_000,
      startupTimeoutMs: 1_000,
      intervalMs: 60_000,
      errorLog,
      infoLog,
      ...options,
    },
  );
  return { pool, sniffer, errorLog, infoLog };
}

function calledUrls(transport: MockTransport): string[] {
  return transport.mock.calls.map(([url]) => String(url));
}

describe("parseNodesInfo", () => {
  it("should read publish addresses and fall back to http_address", () => {
    const connections = parseNodesInfo(
      {
        nodes: {
          a: { http: { publish_address: "10.0.0.1:9200" } },
          b: { http_address: "inet[/10.0.0.2:9200]" },
          c: { http: {} },
          d: "not a node",
        },
      },
      "https",
    );

    expect(connections?.map((c) => c.url)).toEqual(["https://10.0.0.1:9200", "https://10.0.0.2:9200"]);
    expect(connections?.map((c) => c.nodeId)).toEqual(["a", "b"]);
  });

  it("should return undefined without a nodes object", () => {
    expect(parseNodesInfo({}, "http")).toBeUndefined();
    expect(parseNodesInfo({ nodes: [] }, "http")).toBeUndefined();
    expect(parseNodesInfo("nodes", "http")).toBeUndefined();
  });
});

describe("addressToUrl", () => {
  it("should accept the supported address forms", () => {
    expect(addressToUrl("127.0.0.1:9200", "http")).toBe("http://127.0.0.1:9200");
    expect(addressToUrl("es1.local/10.0.0.5:9200", "http")).toBe("http://10.0.0.5:9200");
    expect(addressToUrl("inet[/10.0.0.6:9300]", "https")).toBe("https://10.0.0.6:9300");
    expect(addressToUrl("[::1]:9200", "http")).toBe("http://[::1]:9200");
  });

  it("should drop the default port like the URL API does", () => {
    expect(addressToUrl("127.0.0.1:80", "http")).toBe("http://127.0.0.1");
  });

  it("should reject addresses without a port", () => {
    expect(addressToUrl("10.0.0.1", "http")).toBeUndefined();
    expect(addressToUrl("", "http")).toBeUndefined();
  });
});

describe("Sniffer", () => {
  describe("discover", () => {
    it("should ask the node for its member list", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockImplementation(async () => jsonResponse(nodesInfo({ n1: "10.0.0.1:9200" })));
      const { sniffer } = setup([SEED], transport);

      const connections = await sniffer.discover(SEED);

      expect(connections.map((c) => c.url)).toEqual(["http://10.0.0.1:9200"]);
      expect(transport).toHaveBeenCalledWith(
        "http://127.0.0.1:9200/_nodes/http",
        expect.objectContaining({ method: "GET" }),
      );
    });

    it.each<[string, () => Response, string]>([
      ["a non-2xx status", () => new Response("boom", { status: 500 }), "HTTP 500"],
      ["a non-JSON body", () => new Response("oops"), "response is not JSON"],
      ["a body without nodes", () => jsonResponse({}), "response has no nodes object"],
      ["an empty member list", () => jsonResponse({ nodes: {} }), "no node exposes an HTTP address"],
    ])("should fail on %s", async (_label, respond, reason) => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockImplementation(async () => respond());
      const { sniffer } = setup([SEED], transport);

      await expect(sniffer.discover(SEED)).rejects.toThrow(
        `Discovery via ${SEED} failed: ${reason}`,
      );
    });
  });

  describe("sniff", () => {
    it("should replace the pool with the discovered members", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockImplementation(async () =>
        jsonResponse(nodesInfo({ a: "10.0.0.1:9200", b: "10.0.0.2:9200" })),
      );
      const { pool, sniffer, infoLog } = setup([SEED], transport);

      await sniffer.sniff(1_000);

      expect(pool.urls()).toEqual(["http://10.0.0.1:9200", "http://10.0.0.2:9200"]);
      expect(infoLog.lines).toContain(`Discovered 2 node(s) via ${SEED}`);
    });

    it("should fall through to the next candidate on failure", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockImplementation(async (url) => {
        if (String(url).startsWith(SEED)) {
          throw new Error("connect ECONNREFUSED");
        }
        return jsonResponse(nodesInfo({ a: "10.0.0.1:9200" }));
      });
      const { pool, sniffer, errorLog } = setup([SEED, OTHER], transport);

      await sniffer.sniff(1_000);

      expect(pool.urls()).toEqual(["http://10.0.0.1:9200"]);
      expect(errorLog.lines).toEqual([`Discovery via ${SEED} failed: connect ECONNREFUSED`]);
    });

    it("should try seeds that are no longer pooled", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockImplementation(async (url) => {
        if (String(url).startsWith(SEED)) {
          return new Response("unavailable", { status: 503 });
        }
        return jsonResponse(nodesInfo({ a: "10.0.0.1:9200" }));
      });
      const { sniffer, errorLog } = setup([SEED], transport, { seeds: [SEED, OTHER] });

      await sniffer.sniff(1_000);

      expect(calledUrls(transport)).toEqual([`${SEED}/_nodes/http`, `${OTHER}/_nodes/http`]);
      expect(errorLog.lines).toEqual([`Discovery via ${SEED} failed: HTTP 503`]);
    });

    it("should leave the pool untouched when every candidate fails", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockRejectedValue(new Error("connect ECONNREFUSED"));
      const { pool, sniffer } = setup([SEED, OTHER], transport);

      await expect(sniffer.sniff(1_000)).rejects.toBeInstanceOf(NoUsableNodeError);
      expect(pool.urls()).toEqual([SEED, OTHER]);
    });

    it("should surface the reason of an aborted signal", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      const { sniffer } = setup([SEED], transport);
      const controller = new AbortController();
      const reason = new Error("stopped");
      controller.abort(reason);

      await expect(sniffer.sniff(1_000, controller.signal)).rejects.toBe(reason);
      expect(transport).not.toHaveBeenCalled();
    });

    it("should tear down a discovery request that outlives its timeout", async () => {
      const node = await startHangingNode();
      try {
        const { sniffer, errorLog } = setup([node.url]);

        await expect(sniffer.sniff(100)).rejects.toBeInstanceOf(NoUsableNodeError);
        await node.closed;

        expect(errorLog.lines).toHaveLength(1);
        expect(errorLog.lines[0]).toMatch(new RegExp(`^Discovery via ${node.url} failed: `));
      } finally {
        await node.close();
      }
    });
  });

  describe("sniffOnStartup", () => {
    it("should load the members of a reachable cluster", async () => {
      const node = await startFakeNode();
      try {
        const { pool, sniffer } = setup([node.url]);

        await sniffer.sniffOnStartup();

        expect(pool.urls()).toEqual([node.url]);
        expect(pool.getStatus()[0].nodeId).toBe("node-1");
        expect(node.requests.map((r) => r.url)).toEqual(["/_nodes/http"]);
      } finally {
        await node.close();
      }
    });

    it("should fail only after the startup budget is spent", async () => {
      const url = await unusedUrl();
      const { sniffer } = setup([url], undefined, { startupTimeoutMs: 1_200 });

      const start = Date.now();
      await expect(sniffer.sniffOnStartup()).rejects.toBeInstanceOf(NoUsableNodeError);

      expect(Date.now() - start).toBeGreaterThanOrEqual(1_200);
    }, 10_000);
  });

  describe("run", () => {
    it("should sniff on every interval until aborted", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockImplementation(async () => jsonResponse(nodesInfo({ a: "127.0.0.1:9200" })));
      const { sniffer } = setup([SEED], transport, { intervalMs: 20 });
      const controller = new AbortController();

      const running = sniffer.run(controller.signal);
      await waitFor(() => transport.mock.calls.length >= 2);
      controller.abort();
      await running;

      const calls = transport.mock.calls.length;
      await new Promise((resolve) => setTimeout(resolve, 60));
      expect(transport.mock.calls.length).toBe(calls);
    });

    it("should log failed passes and keep going", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      transport.mockRejectedValue(new Error("connect ECONNREFUSED"));
      const { sniffer, errorLog } = setup([SEED], transport, { intervalMs: 20 });
      const controller = new AbortController();

      const running = sniffer.run(controller.signal);
      await waitFor(() => transport.mock.calls.length >= 2);
      controller.abort();
      await running;

      expect(errorLog.lines.slice(0, 2)).toEqual([
        `Discovery via ${SEED} failed: connect ECONNREFUSED`,
        `Discovery failed: No cluster node returned a member list (tried ${SEED})`,
      ]);
    });

    it("should return at once for an aborted signal", async () => {
      const transport: MockTransport = jest.fn<Transport>();
      const { sniffer } = setup([SEED], transport, { intervalMs: 20 });

      await sniffer.run(AbortSignal.abort());

      expect(transport).not.toHaveBeenCalled();
    });
  });
});
