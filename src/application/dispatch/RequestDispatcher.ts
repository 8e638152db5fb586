import { DecodeError, ValidationError } from "../../core/errors";
import type {
  BatchResult,
  BatchSlot,
  IsolationPolicy,
  Operation,
  ResponsePayload
} from "../../core/operations/operation.types";
import { parseJson } from "../../core/snapshots/bodyDecoders";
import type { HttpRequest, HttpResponse, HttpSession } from "../../ports/HttpSession";
import { createLimiter, mapSettledInOrder } from "../../shared/concurrency/limiter";
import type { Logger } from "../../shared/logging/logger";
import { type RetryPolicy, type StatusErrorMapper, withRetry } from "../../shared/retry/retry";
import {
  createBatchRunSummaryTracker,
  toBatchItemErrorRecord,
  wrapBatchItemFailure
} from "./batch.error-handler";

export type BatchOptions = {
  maxWorkers: number;
  isolation: IsolationPolicy;
};

export type RequestDispatcherDeps = {
  session: HttpSession;
  policy: RetryPolicy;
  logger: Logger;
  defaults: BatchOptions;
};

/**
 * Runs operations against the shared session. Every HTTP call goes through `withRetry`;
 * batches fan out over a bounded pool and come back in input order.
 */
export class RequestDispatcher {
  constructor(private readonly deps: RequestDispatcherDeps) {}

  /** One retried call. Resolves with the 2xx response, rejects with a classified ClientError. */
  async send(request: HttpRequest, options: { mapStatusError?: StatusErrorMapper } = {}): Promise<HttpResponse> {
    const { session, policy, logger } = this.deps;
    let lastUrl = request.path;

    return withRetry(
      async () => {
        const response = await session.send(request);
        lastUrl = response.url;
        return response;
      },
      policy,
      {
        mapStatusError: options.mapStatusError,
        onRetry: ({ attempt, maxAttempts, delayMs, status, faultKind }) => {
          logger.warn({
            event: "http.retry",
            status: status ?? null,
            fault: faultKind ?? null,
            url: lastUrl,
            attempt,
            maxAttempts,
            delayMs
          });
        },
        onGiveUp: ({ attempt, maxAttempts, error }) => {
          logger.warn({
            event: "http.give_up",
            status: error.status ?? null,
            code: error.code,
            url: lastUrl,
            attempt,
            maxAttempts
          });
        }
      }
    );
  }

  async execute(operation: Operation): Promise<ResponsePayload> {
    const response = await this.send(operation.request);
    if (operation.responseFormat !== "json") return response.text;

    try {
      return parseJson(response.text);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.deps.logger.warn({
        event: "dispatch.decode_fallback",
        index: operation.index,
        url: response.url,
        reason: err.message
      });
      return response.text;
    }
  }

  async executeBatch(
    operations: readonly Operation[],
    options: Partial<BatchOptions> = {}
  ): Promise<BatchResult<ResponsePayload>> {
    if (operations.length === 0) {
      throw new ValidationError("Batch cannot be empty");
    }

    const maxWorkers = options.maxWorkers ?? this.deps.defaults.maxWorkers;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new ValidationError(`maxWorkers must be an integer >= 1. Received: ${String(maxWorkers)}`);
    }
    const isolation = options.isolation ?? this.deps.defaults.isolation;

    return isolation === "fail-fast"
      ? this.executeFailFast(operations, maxWorkers)
      : this.executeIsolated(operations, maxWorkers);
  }

  private async executeIsolated(operations: readonly Operation[], maxWorkers: number): Promise<BatchResult<ResponsePayload>> {
    const tracker = createBatchRunSummaryTracker(operations.length);
    const settled = await mapSettledInOrder(operations, maxWorkers, (operation) => this.execute(operation));

    const slots = settled.map((result, index): BatchSlot<ResponsePayload> => {
      const operation = operations[index];
      if (result.status === "fulfilled") {
        tracker.addFulfilled();
        return { status: "fulfilled", index, input: operation.input, value: result.value };
      }
      const error = toBatchItemErrorRecord(result.reason);
      tracker.addRejected(error.code);
      return { status: "rejected", index, input: operation.input, error };
    });

    this.deps.logger.info({ event: "dispatch.batch_completed", isolation: "isolate", ...tracker.summary() });
    return slots;
  }

  // Items still queued when one fails are never sent.
  private async executeFailFast(operations: readonly Operation[], maxWorkers: number): Promise<BatchResult<ResponsePayload>> {
    const limit = createLimiter(Math.min(operations.length, maxWorkers));
    const slots: BatchResult<ResponsePayload> = [];
    let stopped = false;

    await Promise.all(
      operations.map((operation, index) =>
        limit(async () => {
          if (stopped) return;
          try {
            const value = await this.execute(operation);
            slots[index] = { status: "fulfilled", index, input: operation.input, value };
          } catch (err) {
            stopped = true;
            throw wrapBatchItemFailure(err, operation);
          }
        })
      )
    );

    this.deps.logger.info({ event: "dispatch.batch_completed", isolation: "fail-fast", total: operations.length });
    return slots;
  }
}
