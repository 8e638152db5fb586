import { clientCaps } from "../../application/client.config";
import type { IsolationPolicy } from "../../core/operations/operation.types";
import { isLogLevel, type LogLevel } from "../logging/logger";

export type RuntimeConfig = {
  timeoutMs?: number;
  maxWorkers?: number;
  connectionPoolSize?: number;
  logLevel?: LogLevel;
  isolation?: IsolationPolicy;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalChoice = <T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  isChoice: (value: string) => value is T,
  choices: readonly string[]
): T | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (!isChoice(raw)) {
    throw new Error(`${name}=${raw} must be one of: ${choices.join(", ")}`);
  }
  return raw;
};

const isolationPolicies = ["isolate", "fail-fast"] as const;
const isIsolationPolicy = (value: string): value is IsolationPolicy => value === "isolate" || value === "fail-fast";

/** Only what the environment sets; defaults live in the client config. */
export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  timeoutMs: parseOptionalIntInRange(env, "REQUEST_TIMEOUT_MS", clientCaps.timeoutMs),
  maxWorkers: parseOptionalIntInRange(env, "MAX_WORKERS", clientCaps.maxWorkers),
  connectionPoolSize: parseOptionalIntInRange(env, "CONNECTION_POOL_SIZE", clientCaps.connectionPoolSize),
  logLevel: parseOptionalChoice(env, "LOG_LEVEL", isLogLevel, ["debug", "info", "warn", "error"]),
  isolation: parseOptionalChoice(env, "BATCH_ISOLATION", isIsolationPolicy, isolationPolicies)
});
