#!/usr/bin/env node
import type { WebDataClient } from "../application/WebDataClient";
import { createClientFromEnv } from "../composition/root";
import { ValidationError } from "../core/errors";
import { type SnapshotFormat, snapshotFormats } from "../core/snapshots/SnapshotJob";

type CliErrorEnvelope = {
  event: "cli.failed";
  name: string;
  message: string;
  code?: string;
  status?: number;
  stack?: string;
};

const commands = ["zones", "scrape", "search", "snapshot"] as const;
type Command = (typeof commands)[number];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isCommand = (value: string): value is Command => commands.some((command) => command === value);

const isSnapshotFormat = (value: string): value is SnapshotFormat => snapshotFormats.some((format) => format === value);

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/** Never carries the response body or the cause chain. */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "cli.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export type CliClient = Pick<WebDataClient, "listZones" | "scrape" | "search" | "downloadSnapshot" | "downloadContent">;

const usage = "Usage: web-data <zones | scrape <url...> | search <query...> | snapshot <id> [format]>";

/** Runs one command against a ready client and returns what should be printed. */
export const runCommand = async (client: CliClient, argv: readonly string[]): Promise<unknown> => {
  const [name, ...args] = argv;
  if (name == null || !isCommand(name)) {
    throw new ValidationError(name == null ? usage : `Unknown command: ${name}. ${usage}`);
  }

  switch (name) {
    case "zones":
      return client.listZones();
    case "scrape":
      if (args.length === 0) throw new ValidationError("scrape needs at least one URL");
      return args.length === 1 ? client.scrape(args[0]) : client.scrape(args);
    case "search":
      if (args.length === 0) throw new ValidationError("search needs at least one query");
      return args.length === 1 ? client.search(args[0]) : client.search(args);
    case "snapshot": {
      const [snapshotId, rawFormat = "json"] = args;
      if (snapshotId == null) throw new ValidationError("snapshot needs a snapshot id");
      if (!isSnapshotFormat(rawFormat)) {
        throw new ValidationError(`Format must be one of: ${snapshotFormats.join(", ")}`);
      }
      const data = await client.downloadSnapshot(snapshotId, { format: rawFormat });
      const filename = await client.downloadContent(data, { filename: `snapshot_${snapshotId}`, format: rawFormat });
      return { snapshotId, filename };
    }
  }
};

export const executeCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const client = await createClientFromEnv();
    const output = await runCommand(client, argv);
    // eslint-disable-next-line no-console
    console.log(typeof output === "string" ? output : JSON.stringify(output, null, 2));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeCli();
}
