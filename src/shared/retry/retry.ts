import {
  type ClientError,
  TransientError,
  TransportFault,
  type TransportFaultKind,
  errorForStatus
} from "../../core/errors";

export type RetryPolicy = {
  maxAttempts: number;          // total tries, initial one included
  backoffFactor: number;        // delay before retry n is delayUnitMs * backoffFactor^n
  delayUnitMs: number;
  retryStatuses: ReadonlySet<number>;
  sleep: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export const defaultRetryPolicy: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  backoffFactor: 1.5,
  delayUnitMs: 1000,
  retryStatuses: new Set([429, 500, 502, 503, 504]),
  sleep
});

export const createRetryPolicy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => ({
  ...defaultRetryPolicy,
  ...overrides
});

export type CallOutcome =
  | { kind: "response"; status: number; body: string }
  | { kind: "fault"; fault: TransportFault };

export type RetryDecision =
  | { action: "succeed" }
  | { action: "retry"; delayMs: number }
  | { action: "fail"; error: ClientError };

export type StatusErrorMapper = (status: number, body: string) => ClientError;

export const backoffDelayMs = (attempt: number, policy: RetryPolicy): number =>
  policy.delayUnitMs * Math.pow(policy.backoffFactor, attempt);

const exhaustedFaultMessage = (kind: TransportFaultKind, maxAttempts: number, fault: TransportFault): string => {
  switch (kind) {
    case "timeout":
      return `Request timed out after ${maxAttempts} attempts`;
    case "connection":
      return `Connection error after ${maxAttempts} attempts: ${fault.message}`;
    default:
      return `Network error after ${maxAttempts} attempts: ${fault.message}`;
  }
};

/**
 * Decides what to do with the outcome of attempt `attempt` (0-based).
 * Fatal statuses are never retried; they fail through `mapStatusError`.
 */
export const classifyOutcome = (
  outcome: CallOutcome,
  attempt: number,
  policy: RetryPolicy,
  mapStatusError: StatusErrorMapper = errorForStatus
): RetryDecision => {
  const isLastAttempt = attempt >= policy.maxAttempts - 1;

  if (outcome.kind === "fault") {
    if (!isLastAttempt) return { action: "retry", delayMs: backoffDelayMs(attempt, policy) };
    return {
      action: "fail",
      error: new TransientError({
        message: exhaustedFaultMessage(outcome.fault.kind, policy.maxAttempts, outcome.fault),
        attempts: attempt + 1,
        faultKind: outcome.fault.kind,
        cause: outcome.fault
      })
    };
  }

  const { status, body } = outcome;
  if (status >= 200 && status < 300) return { action: "succeed" };

  if (policy.retryStatuses.has(status)) {
    if (!isLastAttempt) return { action: "retry", delayMs: backoffDelayMs(attempt, policy) };
    return {
      action: "fail",
      error: new TransientError({
        message: `Server error after ${policy.maxAttempts} attempts: ${status}`,
        attempts: attempt + 1,
        status
      })
    };
  }

  return { action: "fail", error: mapStatusError(status, body) };
};

export type RetryHooks = {
  mapStatusError?: StatusErrorMapper;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; status?: number; faultKind?: TransportFaultKind }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: ClientError }) => void;
};

/**
 * Runs `call` until it yields a 2xx response or the policy gives up.
 * Errors other than TransportFault are not retried and propagate as they are.
 */
export const withRetry = async <T extends { status: number; text: string }>(
  call: (attempt: number) => Promise<T>,
  policy: RetryPolicy = defaultRetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> => {
  const { mapStatusError, onRetry, onGiveUp } = hooks;
  let attempt = 0;

  while (true) {
    let decision: RetryDecision;
    let outcome: CallOutcome;

    try {
      const response = await call(attempt);
      outcome = { kind: "response", status: response.status, body: response.text };
      decision = classifyOutcome(outcome, attempt, policy, mapStatusError);
      if (decision.action === "succeed") return response;
    } catch (err) {
      if (!(err instanceof TransportFault)) throw err;
      outcome = { kind: "fault", fault: err };
      decision = classifyOutcome(outcome, attempt, policy, mapStatusError);
    }

    if (decision.action === "fail") {
      onGiveUp?.({ attempt: attempt + 1, maxAttempts: policy.maxAttempts, error: decision.error });
      throw decision.error;
    }

    if (decision.action === "retry") {
      onRetry?.({
        attempt: attempt + 1,
        maxAttempts: policy.maxAttempts,
        delayMs: decision.delayMs,
        status: outcome.kind === "response" ? outcome.status : undefined,
        faultKind: outcome.kind === "fault" ? outcome.fault.kind : undefined
      });
      await policy.sleep(decision.delayMs);
    }
    attempt += 1;
  }
};
