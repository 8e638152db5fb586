import type { JsonValue } from "../operations/operation.types";

/**
 * A remote dataset job, known only by its id. Nothing here is persisted: the caller
 * keeps the id and every download call walks the states again from `triggered`.
 *
 *   triggered --download--> downloading --2xx--> retrieved
 *                               |
 *                               +--error--> triggered
 */
export type SnapshotJobState = "triggered" | "downloading" | "retrieved";

export const snapshotFormats = ["json", "ndjson", "jsonl", "csv"] as const;

export type SnapshotFormat = (typeof snapshotFormats)[number];

export type SnapshotJob = {
  snapshotId: string;
  state: "triggered";
  response: Record<string, JsonValue>;
};

export type SnapshotDownloadOptions = {
  format?: SnapshotFormat;
  compress?: boolean;
  batchSize?: number;   // >= 1000
  part?: number;        // >= 1, needs batchSize
};

export type SnapshotData = JsonValue | string;

export type SnapshotTriggerItem = Record<string, JsonValue>;

const transitions: Record<SnapshotJobState, readonly SnapshotJobState[]> = {
  triggered: ["downloading"],
  downloading: ["retrieved", "triggered"],
  retrieved: []
};

export const advanceSnapshotState = (from: SnapshotJobState, to: SnapshotJobState): SnapshotJobState => {
  if (!transitions[from].includes(to)) {
    throw new Error(`Illegal snapshot state transition ${from} -> ${to}`);
  }
  return to;
};
