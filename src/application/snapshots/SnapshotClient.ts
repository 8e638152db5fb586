import { z } from "zod";
import {
  AuthenticationError,
  NotFoundError,
  ProviderError,
  TransientError,
  ValidationError,
  toErrorMessage
} from "../../core/errors";
import type { JsonValue } from "../../core/operations/operation.types";
import { decodeSnapshotBody, parseJson } from "../../core/snapshots/bodyDecoders";
import {
  type SnapshotData,
  type SnapshotDownloadOptions,
  type SnapshotJob,
  type SnapshotJobState,
  type SnapshotTriggerItem,
  advanceSnapshotState,
  snapshotFormats
} from "../../core/snapshots/SnapshotJob";
import type { HttpResponse } from "../../ports/HttpSession";
import type { Logger } from "../../shared/logging/logger";
import type { RequestDispatcher } from "../dispatch/RequestDispatcher";

const snapshotIdMessage = "Snapshot ID is required and must be a non-empty string";

const DownloadOptionsSchema = z
  .object({
    snapshotId: z
      .string({ message: snapshotIdMessage })
      .trim()
      .min(1, { message: snapshotIdMessage }),
    format: z.enum(snapshotFormats, { message: "Format must be one of: json, ndjson, jsonl, csv" }).default("json"),
    compress: z.boolean({ message: "Compress must be a boolean" }).default(false),
    batchSize: z
      .number({ message: "Batch size must be an integer >= 1000" })
      .int({ message: "Batch size must be an integer >= 1000" })
      .min(1000, { message: "Batch size must be an integer >= 1000" })
      .optional(),
    part: z
      .number({ message: "Part must be a positive integer" })
      .int({ message: "Part must be a positive integer" })
      .min(1, { message: "Part must be a positive integer" })
      .optional()
  })
  .superRefine((value, ctx) => {
    if (value.part != null && value.batchSize == null) {
      ctx.addIssue({
        code: "custom",
        message: "Part parameter requires batch_size to be specified",
        path: ["part"]
      });
    }
  });

export type ValidatedDownload = z.output<typeof DownloadOptionsSchema>;

/** Runs before any network call; throws ValidationError with the first problem found. */
export const validateDownloadOptions = (snapshotId: unknown, options: SnapshotDownloadOptions = {}): ValidatedDownload => {
  const parsed = DownloadOptionsSchema.safeParse({ snapshotId, ...options });
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid snapshot download options");
  }
  return parsed.data;
};

const isJsonRecord = (value: JsonValue): value is Record<string, JsonValue> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Async dataset jobs: trigger returns an id, download fetches the result by id.
 * Both go through the dispatcher's single-call path, so they share its retry policy.
 */
export class SnapshotClient {
  constructor(private readonly deps: { dispatcher: RequestDispatcher; logger: Logger }) {}

  async trigger(datasetId: string, items: readonly SnapshotTriggerItem[]): Promise<SnapshotJob> {
    if (datasetId.trim() === "") {
      throw new ValidationError("Dataset ID is required");
    }
    if (items.length === 0) {
      throw new ValidationError("At least one item is required");
    }

    let response: HttpResponse;
    try {
      response = await this.deps.dispatcher.send(
        {
          method: "POST",
          path: "/datasets/v3/trigger",
          query: { dataset_id: datasetId, include_errors: "true" },
          body: items
        },
        {
          mapStatusError: (status, body) =>
            status === 401
              ? new AuthenticationError("Invalid API token or insufficient permissions", body)
              : new ProviderError({
                  code: "snapshot_trigger_failed",
                  message: `Snapshot trigger failed with status ${status}: ${body}`,
                  status,
                  body
                })
        }
      );
    } catch (err) {
      if (err instanceof TransientError) {
        throw new TransientError({
          message: `Network error while triggering snapshot: ${err.message}`,
          attempts: err.attempts,
          status: err.status,
          faultKind: err.faultKind,
          cause: err
        });
      }
      throw err;
    }

    let json: JsonValue;
    try {
      json = parseJson(response.text);
    } catch (err) {
      throw new ProviderError({
        code: "invalid_response",
        message: `Failed to parse snapshot trigger response: ${toErrorMessage(err)}`,
        status: response.status,
        cause: err
      });
    }

    const snapshotId = isJsonRecord(json) ? json.snapshot_id : undefined;
    if (!isJsonRecord(json) || typeof snapshotId !== "string" || snapshotId === "") {
      throw new ProviderError({
        code: "invalid_response",
        message: "Snapshot trigger response did not contain a snapshot_id",
        status: response.status
      });
    }

    this.deps.logger.info({ event: "snapshot.triggered", snapshotId, datasetId, items: items.length });
    return { snapshotId, state: "triggered", response: json };
  }

  async download(snapshotId: string, options: SnapshotDownloadOptions = {}): Promise<SnapshotData> {
    const validated = validateDownloadOptions(snapshotId, options);
    const { logger } = this.deps;
    let state: SnapshotJobState = "triggered";

    state = advanceSnapshotState(state, "downloading");
    logger.info({ event: "snapshot.downloading", snapshotId: validated.snapshotId, state, format: validated.format });

    let response: HttpResponse;
    try {
      response = await this.deps.dispatcher.send(
        {
          method: "GET",
          path: `/datasets/v3/snapshot/${encodeURIComponent(validated.snapshotId)}`,
          query: {
            format: validated.format === "json" ? undefined : validated.format,
            compress: validated.compress ? "true" : undefined,
            batch_size: validated.batchSize,
            part: validated.part
          }
        },
        {
          mapStatusError: (status, body) => {
            if (status === 404) return new NotFoundError(`Snapshot '${validated.snapshotId}' not found`, body);
            if (status === 401) return new AuthenticationError("Invalid API token or insufficient permissions", body);
            return new ProviderError({
              code: "snapshot_download_failed",
              message: `Failed to download snapshot with status ${status}: ${body}`,
              status,
              body
            });
          }
        }
      );
    } catch (err) {
      logger.warn({
        event: "snapshot.download_failed",
        snapshotId: validated.snapshotId,
        state: advanceSnapshotState(state, "triggered"),
        reason: toErrorMessage(err)
      });
      throw err;
    }

    const { decoder, data } = decodeSnapshotBody(response.text, validated.format);
    state = advanceSnapshotState(state, "retrieved");
    logger.info({
      event: "snapshot.retrieved",
      snapshotId: validated.snapshotId,
      state,
      decoder,
      records: Array.isArray(data) ? data.length : null
    });
    return data;
  }
}
