export { WebDataClient, type BatchCallOptions } from "./application/WebDataClient";
export {
  type ClientConfig,
  type ClientConfigInput,
  clientCaps,
  defaultClientConfig,
  resolveClientConfig
} from "./application/client.config";
export { RequestDispatcher, type BatchOptions } from "./application/dispatch/RequestDispatcher";
export { ZoneManager } from "./application/zones/ZoneManager";
export { SnapshotClient, validateDownloadOptions } from "./application/snapshots/SnapshotClient";
export { CHATGPT_DATASET_ID, buildPromptItems, type PromptOptions } from "./application/snapshots/promptItems";
export { type ScrapeOptions, buildScrapeOperations } from "./application/operations/scrape.operations";
export { type SearchEngine, type SearchOptions, buildSearchOperations } from "./application/operations/search.operations";
export { createClient, createClientFromEnv, resolveConfigFromEnv, type ClientOverrides } from "./composition/root";
export * from "./core/errors";
export type * from "./core/operations/operation.types";
export type * from "./core/snapshots/SnapshotJob";
export type { Zone, ZoneType, RequiredZones, ZoneProvisioningResult } from "./core/zones/zone.types";
export type { HttpRequest, HttpResponse, HttpSession } from "./ports/HttpSession";
export type { ContentFormat, ContentWriter, WriteContentOptions } from "./ports/ContentWriter";
export { FetchHttpSession } from "./infrastructure/http/FetchHttpSession";
export { FileContentWriter } from "./infrastructure/fs/FileContentWriter";
export { type Logger, type LogLevel, createConsoleLogger, silentLogger } from "./shared/logging/logger";
export { type RetryPolicy, createRetryPolicy, defaultRetryPolicy, withRetry } from "./shared/retry/retry";
