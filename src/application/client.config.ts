import type { IsolationPolicy } from "../core/operations/operation.types";
import { validateApiToken, validateZoneName } from "../core/operations/validation";
import { ValidationError } from "../core/errors";
import type { LogLevel } from "../shared/logging/logger";

export type ClientConfig = {
  apiToken: string;
  apiBaseUrl: string;
  autoCreateZones: boolean;
  webUnlockerZone: string;
  serpZone: string;
  browserZone?: string;
  timeoutMs: number;
  maxWorkers: number;
  connectionPoolSize: number;
  isolation: IsolationPolicy;
  logLevel: LogLevel;
  verbose: boolean;
  structuredLogging: boolean;
};

export type ClientConfigInput = Partial<ClientConfig>;

export const defaultClientConfig: Omit<ClientConfig, "apiToken"> = {
  apiBaseUrl: "https://api.brightdata.com",
  autoCreateZones: true,
  webUnlockerZone: "sdk_unlocker",
  serpZone: "sdk_serp",
  timeoutMs: 30000,
  maxWorkers: 10,
  connectionPoolSize: 20,
  isolation: "isolate",
  logLevel: "info",
  verbose: false,
  structuredLogging: true
};

export const clientCaps = {
  timeoutMs: { min: 1000, max: 300000 },
  maxWorkers: { min: 1, max: 100 },
  connectionPoolSize: { min: 1, max: 100 }
} as const;

export const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateClientConfig = (config: ClientConfig): ClientConfig => {
  validateApiToken(config.apiToken);
  validateZoneName(config.webUnlockerZone);
  validateZoneName(config.serpZone);
  if (config.browserZone != null) validateZoneName(config.browserZone);
  assertIntegerInRange("timeoutMs", config.timeoutMs, clientCaps.timeoutMs.min, clientCaps.timeoutMs.max);
  assertIntegerInRange("maxWorkers", config.maxWorkers, clientCaps.maxWorkers.min, clientCaps.maxWorkers.max);
  assertIntegerInRange(
    "connectionPoolSize",
    config.connectionPoolSize,
    clientCaps.connectionPoolSize.min,
    clientCaps.connectionPoolSize.max
  );
  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const resolveClientConfig = (input: ClientConfigInput = {}): ClientConfig =>
  validateClientConfig({
    apiToken: input.apiToken ?? "",
    apiBaseUrl: normalizeOptionalString(input.apiBaseUrl) ?? defaultClientConfig.apiBaseUrl,
    autoCreateZones: input.autoCreateZones ?? defaultClientConfig.autoCreateZones,
    webUnlockerZone: normalizeOptionalString(input.webUnlockerZone) ?? defaultClientConfig.webUnlockerZone,
    serpZone: normalizeOptionalString(input.serpZone) ?? defaultClientConfig.serpZone,
    browserZone: normalizeOptionalString(input.browserZone),
    timeoutMs: input.timeoutMs ?? defaultClientConfig.timeoutMs,
    maxWorkers: input.maxWorkers ?? defaultClientConfig.maxWorkers,
    connectionPoolSize: input.connectionPoolSize ?? defaultClientConfig.connectionPoolSize,
    isolation: input.isolation ?? defaultClientConfig.isolation,
    logLevel: input.logLevel ?? defaultClientConfig.logLevel,
    verbose: input.verbose ?? defaultClientConfig.verbose,
    structuredLogging: input.structuredLogging ?? defaultClientConfig.structuredLogging
  });
