import { readFileSync } from "fs";
import path from "path";

describe("web-data CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/run");

    const error = Object.assign(new Error("Failed to download snapshot with status 500: upstream"), {
      name: "ProviderError",
      code: "snapshot_download_failed",
      status: 500,
      body: "secret response body",
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "cli.failed",
      name: "ProviderError",
      message: "Failed to download snapshot with status 500: upstream",
      code: "snapshot_download_failed",
      status: 500
    });
    expect(JSON.stringify(envelope)).not.toContain("secret");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/run");

    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
    expect(buildCliErrorEnvelope("plain failure", false)).toEqual({
      event: "cli.failed",
      name: "Error",
      message: "plain failure"
    });
    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const createClientFromEnv = jest.fn().mockRejectedValue(
      Object.assign(new Error("API token appears to be invalid"), {
        name: "ValidationError",
        code: "validation_failed",
        cause: { huge: "do-not-print-this" }
      })
    );
    jest.doMock("../../src/composition/root", () => ({ createClientFromEnv }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeCli } = await import("../../src/cli/run");
    await expect(executeCli(["zones"])).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0] ?? ""))).toEqual({
      event: "cli.failed",
      name: "ValidationError",
      message: "API token appears to be invalid",
      code: "validation_failed"
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("prints command output as JSON", async () => {
    const client = { listZones: jest.fn().mockResolvedValue([{ name: "sdk_serp", type: "serp" }]) };
    jest.doMock("../../src/composition/root", () => ({ createClientFromEnv: jest.fn().mockResolvedValue(client) }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);

    const { executeCli } = await import("../../src/cli/run");
    await executeCli(["zones"]);

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify([{ name: "sdk_serp", type: "serp" }], null, 2));
  });

  const fakeClient = () => ({
    listZones: jest.fn().mockResolvedValue([]),
    scrape: jest.fn().mockResolvedValue("<html></html>"),
    search: jest.fn().mockResolvedValue([]),
    downloadSnapshot: jest.fn().mockResolvedValue([{ a: 1 }]),
    downloadContent: jest.fn().mockResolvedValue("snapshot_s_1.ndjson")
  });

  it("dispatches commands to the client", async () => {
    const client = fakeClient();
    const { runCommand } = await import("../../src/cli/run");
    const run = (argv: string[]) => runCommand(client, argv);

    await expect(run(["scrape", "https://example.com"])).resolves.toBe("<html></html>");
    expect(client.scrape).toHaveBeenCalledWith("https://example.com");

    await run(["search", "coffee", "tea"]);
    expect(client.search).toHaveBeenCalledWith(["coffee", "tea"]);

    await expect(run(["snapshot", "s_1", "ndjson"])).resolves.toEqual({
      snapshotId: "s_1",
      filename: "snapshot_s_1.ndjson"
    });
    expect(client.downloadSnapshot).toHaveBeenCalledWith("s_1", { format: "ndjson" });
    expect(client.downloadContent).toHaveBeenCalledWith([{ a: 1 }], { filename: "snapshot_s_1", format: "ndjson" });
  });

  it.each([
    [[], "Usage: web-data <zones | scrape <url...> | search <query...> | snapshot <id> [format]>"],
    [["crawl"], "Unknown command: crawl."],
    [["scrape"], "scrape needs at least one URL"],
    [["snapshot"], "snapshot needs a snapshot id"],
    [["snapshot", "s_1", "xml"], "Format must be one of: json, ndjson, jsonl, csv"]
  ])("rejects invalid arguments %p", async (argv, message) => {
    const { runCommand } = await import("../../src/cli/run");
    const client = fakeClient();

    await expect(runCommand(client, argv)).rejects.toThrow(message);
    expect(client.downloadSnapshot).not.toHaveBeenCalled();
  });

  it("starts with a node shebang so the installed bin runs directly", () => {
    const source = readFileSync(path.join(__dirname, "../../src/cli/run.ts"), "utf8");

    expect(source.split("\n")[0]).toBe("#!/usr/bin/env node");
  });
});
