import http from "http";
import { TransportFault } from "../../src/core/errors";
import { FetchHttpSession } from "../../src/infrastructure/http/FetchHttpSession";
import { readRequestBody, startServer } from "../support/httpServer";

const sessionFor = (baseUrl: string, overrides: Partial<ConstructorParameters<typeof FetchHttpSession>[0]> = {}) =>
  new FetchHttpSession({
    baseUrl,
    apiToken: "test-token-123",
    userAgent: "web-data-client/test",
    timeoutMs: 2000,
    connectionPoolSize: 20,
    ...overrides
  });

describe("FetchHttpSession", () => {
  it("sends auth headers, query parameters and a JSON body", async () => {
    let seen: { method?: string; url?: string; headers?: http.IncomingHttpHeaders; body?: string } = {};
    const server = await startServer(async (req, res) => {
      seen = { method: req.method, url: req.url, headers: req.headers, body: await readRequestBody(req) };
      res.writeHead(200, { "content-type": "application/json" });
      res.end('{"ok":true}');
    });

    try {
      const session = sessionFor(`${server.baseUrl}/api`);
      const response = await session.send({
        method: "POST",
        path: "/datasets/v3/trigger",
        query: { dataset_id: "gd_1", include_errors: "true", skipped: undefined, part: 2 },
        body: [{ url: "https://example.com" }]
      });

      expect(response).toEqual({
        status: 200,
        text: '{"ok":true}',
        url: `${server.baseUrl}/api/datasets/v3/trigger`
      });
      expect(seen.method).toBe("POST");
      expect(seen.url).toBe("/api/datasets/v3/trigger?dataset_id=gd_1&include_errors=true&part=2");
      expect(seen.headers?.authorization).toBe("Bearer test-token-123");
      expect(seen.headers?.["content-type"]).toBe("application/json");
      expect(seen.headers?.["user-agent"]).toBe("web-data-client/test");
      expect(seen.body).toBe('[{"url":"https://example.com"}]');
    } finally {
      await server.close();
    }
  });

  it("returns non-2xx responses instead of throwing", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(503, { "content-type": "text/plain" });
      res.end("busy");
    });

    try {
      const response = await sessionFor(server.baseUrl).send({ method: "GET", path: "zone/get_active_zones" });
      expect(response).toEqual({ status: 503, text: "busy", url: `${server.baseUrl}/zone/get_active_zones` });
    } finally {
      await server.close();
    }
  });

  it("keeps query strings out of the reported url", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(200);
      res.end("");
    });

    try {
      const response = await sessionFor(server.baseUrl).send({
        method: "GET",
        path: "/datasets/v3/snapshot/s_1",
        query: { format: "csv" }
      });
      expect(response.url).toBe(`${server.baseUrl}/datasets/v3/snapshot/s_1`);
    } finally {
      await server.close();
    }
  });

  it("raises a timeout fault when the per-call timeout elapses", async () => {
    const server = await startServer((_req, res) => {
      setTimeout(() => {
        res.writeHead(200);
        res.end("late");
      }, 500);
    });

    try {
      const error = await sessionFor(server.baseUrl)
        .send({ method: "GET", path: "/slow", timeoutMs: 50 })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportFault);
      expect(error).toMatchObject({
        kind: "timeout",
        message: `Request timeout after 50ms: ${server.baseUrl}/slow`
      });
    } finally {
      await server.close();
    }
  });

  it("raises a connection fault when nothing listens", async () => {
    const server = await startServer(() => undefined);
    const { baseUrl } = server;
    await server.close();

    const error = await sessionFor(baseUrl).send({ method: "GET", path: "/" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportFault);
    expect(error).toMatchObject({ kind: "connection" });
  });

  it("classifies other fetch failures as network faults", async () => {
    const fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>(() => Promise.reject(new TypeError("fetch failed")));
    const session = sessionFor("https://api.test", { fetchFn });

    const error = await session.send({ method: "GET", path: "/x" }).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "network", message: "fetch failed: https://api.test/x" });
  });

  it("caps in-flight requests at the connection pool size", async () => {
    let active = 0;
    let maxActive = 0;
    const fetchFn = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 10));
      active -= 1;
      return new Response("ok", { status: 200 });
    });
    const session = sessionFor("https://api.test", { fetchFn, connectionPoolSize: 2 });

    await Promise.all(Array.from({ length: 6 }, () => session.send({ method: "GET", path: "/x" })));

    expect(fetchFn).toHaveBeenCalledTimes(6);
    expect(maxActive).toBe(2);
  });
});
