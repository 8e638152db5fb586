import http from "http";
import { URL } from "url";

/**
 * Minimal fake of the scraping API for local runs and E2E.
 * - GET  /zone/get_active_zones
 * - POST /zone                     (duplicate names are rejected like the real API)
 * - POST /request                  (echoes the target URL; "/flaky" targets fail once with 503, "/broken" always 500)
 * - POST /datasets/v3/trigger
 * - GET  /datasets/v3/snapshot/:id (ndjson for triggered ids, 404 otherwise)
 */
export type FakeApiServerOptions = {
  apiToken: string;
  zones?: Array<{ name: string; type: string }>;
};

export type FakeApiState = {
  zones: Array<{ name: string; type: string }>;
  requests: Array<{ method: string; path: string }>;
  snapshots: Map<string, unknown[]>;
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseBody = (text: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
};

const sendJson = (res: http.ServerResponse, status: number, payload: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(payload));
};

export const createFakeApiServer = (options: FakeApiServerOptions) => {
  const state: FakeApiState = {
    zones: [...(options.zones ?? [])],
    requests: [],
    snapshots: new Map()
  };
  const flakyHits = new Map<string, number>();
  let nextSnapshot = 1;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://127.0.0.1");
    const method = req.method ?? "GET";
    state.requests.push({ method, path: url.pathname });

    if (req.headers.authorization !== `Bearer ${options.apiToken}`) {
      return sendJson(res, 401, { error: "unauthorized" });
    }

    const raw = parseBody(await readBody(req));
    const body = isRecord(raw) ? raw : {};

    if (method === "GET" && url.pathname === "/zone/get_active_zones") {
      return sendJson(res, 200, state.zones);
    }

    if (method === "POST" && url.pathname === "/zone") {
      const zone = isRecord(body.zone) ? body.zone : {};
      const name = typeof zone.name === "string" ? zone.name : "";
      const type = typeof zone.type === "string" ? zone.type : "unblocker";
      if (state.zones.some((existing) => existing.name === name)) {
        res.writeHead(400, { "content-type": "text/plain" });
        return res.end("Duplicate zone name");
      }
      state.zones.push({ name, type });
      return sendJson(res, 200, { name });
    }

    if (method === "POST" && url.pathname === "/request") {
      const target = typeof body.url === "string" ? body.url : "";
      if (target.includes("/broken")) {
        res.writeHead(500);
        return res.end("upstream failure");
      }
      if (target.includes("/flaky")) {
        const hits = (flakyHits.get(target) ?? 0) + 1;
        flakyHits.set(target, hits);
        if (hits === 1) {
          res.writeHead(503);
          return res.end("try again");
        }
      }
      if (body.format === "json") {
        return sendJson(res, 200, { url: target, status_code: 200, body: `<html>${target}</html>` });
      }
      res.writeHead(200, { "content-type": "text/html" });
      return res.end(`<html>${target}</html>`);
    }

    if (method === "POST" && url.pathname === "/datasets/v3/trigger") {
      const snapshotId = `s_fake_${nextSnapshot}`;
      nextSnapshot += 1;
      state.snapshots.set(snapshotId, Array.isArray(raw) ? raw : []);
      return sendJson(res, 200, { snapshot_id: snapshotId });
    }

    const snapshotMatch = /^\/datasets\/v3\/snapshot\/([^/]+)$/.exec(url.pathname);
    if (method === "GET" && snapshotMatch) {
      const records = state.snapshots.get(decodeURIComponent(snapshotMatch[1]));
      if (records == null) {
        res.writeHead(404);
        return res.end("snapshot not found");
      }
      res.writeHead(200, { "content-type": "application/x-ndjson" });
      return res.end(records.map((record) => JSON.stringify(record)).join("\n"));
    }

    res.writeHead(404);
    return res.end();
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      res.writeHead(500);
      res.end(err instanceof Error ? err.message : String(err));
    });
  });

  return { server, state };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_API_PORT ?? 3999);
  const { server } = createFakeApiServer({ apiToken: process.env.BRIGHTDATA_API_TOKEN ?? "test-token-123" });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake API server on http://localhost:${port}`);
  });
}
