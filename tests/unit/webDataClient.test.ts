import { resolveClientConfig } from "../../src/application/client.config";
import { RequestDispatcher } from "../../src/application/dispatch/RequestDispatcher";
import { SnapshotClient } from "../../src/application/snapshots/SnapshotClient";
import { WebDataClient } from "../../src/application/WebDataClient";
import { ZoneManager } from "../../src/application/zones/ZoneManager";
import { createClient } from "../../src/composition/root";
import type { ContentWriter } from "../../src/ports/ContentWriter";
import { type Reply, createFakeSession, createRecordingLogger, delay, fastRetryPolicy, targetUrlOf } from "../support/fakes";

const apiToken = "test-token-123";

const setup = async (input: Parameters<typeof createClient>[0] = {}, contentWriter?: ContentWriter) => {
  const fake = createFakeSession((request) => {
    if (request.path === "/datasets/v3/trigger") return { status: 200, text: '{"snapshot_id":"s_42"}' };
    const url = targetUrlOf(request);
    return url.includes("fail") ? { status: 404, text: "missing" } : { status: 200, text: `[${JSON.stringify(url)}]` };
  });
  const { logger, entries } = createRecordingLogger();
  const client = await createClient(
    { apiToken, autoCreateZones: false, ...input },
    { session: fake.session, logger, retryPolicy: fastRetryPolicy(), contentWriter }
  );
  return { client, entries, requests: fake.requests };
};

/** A client that has not provisioned yet; zone calls go through `zoneReply`. */
const unprovisionedClient = (zoneReply: (call: number) => Reply | Promise<Reply>) => {
  const { session, requests } = createFakeSession((request, call) =>
    request.path === "/zone/get_active_zones" ? { status: 200, text: "[]" } : zoneReply(call)
  );
  const { logger } = createRecordingLogger();
  const dispatcher = new RequestDispatcher({
    session,
    policy: fastRetryPolicy(),
    logger,
    defaults: { maxWorkers: 10, isolation: "isolate" }
  });
  const client = new WebDataClient({
    config: resolveClientConfig({ apiToken }),
    logger,
    dispatcher,
    zones: new ZoneManager({ session, logger }),
    snapshots: new SnapshotClient({ dispatcher, logger }),
    contentWriter: { write: () => Promise.resolve("unused") }
  });
  return { client, requests };
};

describe("WebDataClient", () => {
  it("shares one provisioning run between concurrent init calls", async () => {
    const { client, requests } = unprovisionedClient(async () => {
      await delay(10);
      return { status: 200, text: "{}" };
    });

    const [first, second] = await Promise.all([client.init(), client.init()]);

    expect(first).toEqual({ existing: [], created: ["sdk_unlocker", "sdk_serp"], skipped: false });
    expect(second).toBe(first);
    expect(requests.map(({ method, path }) => `${method} ${path}`)).toEqual([
      "GET /zone/get_active_zones",
      "POST /zone",
      "POST /zone"
    ]);
  });

  it("runs provisioning again after a failed run", async () => {
    const { client, requests } = unprovisionedClient((call) =>
      call === 2 ? { status: 500, text: "quota exceeded" } : { status: 200, text: "{}" }
    );

    await expect(client.init()).rejects.toThrow("Failed to create zone sdk_unlocker: quota exceeded");
    await expect(client.init()).resolves.toEqual({
      existing: [],
      created: ["sdk_unlocker", "sdk_serp"],
      skipped: false
    });
    expect(requests).toHaveLength(5);
  });

  it("requires the browser zone as an unblocker zone when configured", async () => {
    const { client } = await setup({ browserZone: "my_browser" });

    expect(client.requiredZones()).toEqual({ sdk_unlocker: "unblocker", sdk_serp: "serp", my_browser: "unblocker" });
  });

  it("throws for a failed single scrape", async () => {
    const { client } = await setup();

    await expect(client.scrape("https://example.com/fail")).rejects.toThrow("Not Found (404): missing");
  });

  it("returns a batch result for a list of queries", async () => {
    const { client, requests } = await setup();

    const results = await client.search(["tea", "fail"], { searchEngine: "bing", responseFormat: "json" });

    expect(results).toEqual([
      { status: "fulfilled", index: 0, input: "tea", value: ["https://www.bing.com/search?q=tea"] },
      {
        status: "rejected",
        index: 1,
        input: "fail",
        error: { name: "NotFoundError", code: "not_found", message: "Not Found (404): missing", status: 404 }
      }
    ]);
    expect(requests[0].body).toMatchObject({ zone: "sdk_serp" });
  });

  it("fails the whole batch when the client is configured for fail-fast", async () => {
    const { client } = await setup({ isolation: "fail-fast" });

    await expect(client.scrape(["https://example.com/ok", "https://example.com/fail"])).rejects.toThrow(
      "Failed to scrape https://example.com/fail: Not Found (404): missing"
    );
  });

  it("lets a call override the configured isolation", async () => {
    const { client } = await setup({ isolation: "fail-fast" });

    const results = await client.scrape(["https://example.com/fail"], { isolation: "isolate" });
    expect(results[0].status).toBe("rejected");
  });

  it("submits prompts to the ChatGPT dataset", async () => {
    const { client, requests, entries } = await setup();

    const job = await client.scrapeChatGpt("hello there", { webSearch: true });

    expect(job.snapshotId).toBe("s_42");
    expect(requests[0].query).toEqual({ dataset_id: "gd_m7aof0k82r803d5bjm", include_errors: "true" });
    expect(entries).toContainEqual({ level: "info", event: "snapshot.prompts_submitted", snapshotId: "s_42", prompts: 1 });
  });

  it("hands content to the configured writer", async () => {
    const write = jest.fn<Promise<string>, Parameters<ContentWriter["write"]>>().mockResolvedValue("saved.csv");
    const { client } = await setup({}, { write });

    await expect(client.downloadContent("a,b\n1,2", { format: "csv" })).resolves.toBe("saved.csv");
    expect(write).toHaveBeenCalledWith("a,b\n1,2", { format: "csv" });
  });
});
