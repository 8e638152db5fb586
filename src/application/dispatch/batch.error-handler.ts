import { BatchItemError, ClientError, toErrorMessage } from "../../core/errors";
import type { BatchItemErrorRecord, Operation } from "../../core/operations/operation.types";

const describeFailure = (operation: Operation, reason: unknown): string => {
  const target = operation.label === "search" ? `'${operation.input}'` : operation.input;
  return `Failed to ${operation.label} ${target}: ${toErrorMessage(reason)}`;
};

/** Isolate mode: the failure becomes data in the item's own slot. */
export const toBatchItemErrorRecord = (reason: unknown): BatchItemErrorRecord => {
  if (reason instanceof ClientError) {
    const record: BatchItemErrorRecord = { name: reason.name, code: reason.code, message: reason.message };
    if (reason.status != null) record.status = reason.status;
    return record;
  }

  return {
    name: reason instanceof Error ? reason.name || "Error" : "Error",
    code: "unexpected",
    message: toErrorMessage(reason)
  };
};

/** Fail-fast mode: the failure aborts the batch, wrapped with the input that caused it. */
export const wrapBatchItemFailure = (reason: unknown, operation: Operation): BatchItemError =>
  new BatchItemError({
    message: describeFailure(operation, reason),
    index: operation.index,
    input: operation.input,
    cause: reason
  });

export type BatchRunSummary = {
  total: number;
  fulfilled: number;
  rejected: number;
  byCode: Record<string, number>;
};

export const createBatchRunSummaryTracker = (total: number) => {
  let fulfilled = 0;
  const byCode: Record<string, number> = {};

  return {
    addFulfilled: () => {
      fulfilled += 1;
    },
    addRejected: (code: string) => {
      byCode[code] = (byCode[code] ?? 0) + 1;
    },
    summary: (): BatchRunSummary => {
      const rejected = Object.values(byCode).reduce((sum, count) => sum + count, 0);
      return { total, fulfilled, rejected, byCode: { ...byCode } };
    }
  };
};
