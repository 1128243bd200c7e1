import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingMessage["headers"];
}

export interface FakeNode {
  url: string;
  address: string;
  server: Server;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

export type NodeHandler = (req: IncomingMessage, res: ServerResponse, node: FakeNode) => void;

/**
 * Answers HEAD / with 200 and /_nodes/http with a member list naming itself.
 */
export const defaultHandler: NodeHandler = (req, res, node) => {
  if (req.url === "/_nodes/http") {
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify(nodesInfo({ "node-1": node.address })));
    return;
  }
  res.writeHead(200, { "content-type": "application/json" });
  res.end(req.method === "HEAD" ? undefined : JSON.stringify({ status: 200 }));
};

/**
 * In-process cluster node on 127.0.0.1 and an ephemeral port.
 */
export async function startFakeNode(handler: NodeHandler = defaultHandler): Promise<FakeNode> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Fake node is not bound to a TCP port.");
  }
  const { port } = address;

  const node: FakeNode = {
    url: `http://127.0.0.1:${port}`,
    address: `127.0.0.1:${port}`,
    server,
    requests: [],
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };

  server.on("request", (req: IncomingMessage, res: ServerResponse) => {
    node.requests.push({ method: req.method ?? "", url: req.url ?? "", headers: req.headers });
    handler(req, res, node);
  });

  return node;
}

/**
 * URL of a port nothing listens on.
 */
export async function unusedUrl(): Promise<string> {
  const node = await startFakeNode();
  const { url } = node;
  await node.close();
  return url;
}

export function nodesInfo(addresses: Record<string, string>): {
  nodes: Record<string, { http: { publish_address: string } }>;
} {
  const nodes: Record<string, { http: { publish_address: string } }> = {};
  for (const [id, address] of Object.entries(addresses)) {
    nodes[id] = { http: { publish_address: address } };
  }
  return { nodes };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/**
 * Poll until `predicate` holds. Rejects after `timeoutMs`.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/**
 * Fake node that accepts requests and never answers. `closed` resolves once
 * the client side has torn the request down.
 */
export async function startHangingNode(): Promise<FakeNode & { closed: Promise<void> }> {
  let markClosed: () => void = () => {};
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });
  const node = await startFakeNode((_req, res) => {
    res.on("close", () => markClosed());
  });
  return { ...node, closed };
}
