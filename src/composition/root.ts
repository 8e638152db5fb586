import * as dotenv from "dotenv";
import { type ClientConfigInput, resolveClientConfig } from "../application/client.config";
import { RequestDispatcher } from "../application/dispatch/RequestDispatcher";
import { SnapshotClient } from "../application/snapshots/SnapshotClient";
import { WebDataClient } from "../application/WebDataClient";
import { ZoneManager } from "../application/zones/ZoneManager";
import { previewToken } from "../core/operations/validation";
import { FileContentWriter } from "../infrastructure/fs/FileContentWriter";
import { FetchHttpSession } from "../infrastructure/http/FetchHttpSession";
import type { ContentWriter } from "../ports/ContentWriter";
import type { HttpSession } from "../ports/HttpSession";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createConsoleLogger, type Logger } from "../shared/logging/logger";
import { type RetryPolicy, defaultRetryPolicy } from "../shared/retry/retry";

export const USER_AGENT = "web-data-client/0.1.0";

export type ClientOverrides = {
  session?: HttpSession;
  logger?: Logger;
  retryPolicy?: RetryPolicy;
  contentWriter?: ContentWriter;
};

/** Builds a ready client. Zone provisioning has already run when this resolves. */
export const createClient = async (
  input: ClientConfigInput = {},
  overrides: ClientOverrides = {}
): Promise<WebDataClient> => {
  const config = resolveClientConfig(input);
  const logger =
    overrides.logger ??
    createConsoleLogger({ level: config.logLevel, verbose: config.verbose, structured: config.structuredLogging });

  const session =
    overrides.session ??
    new FetchHttpSession({
      baseUrl: config.apiBaseUrl,
      apiToken: config.apiToken,
      userAgent: USER_AGENT,
      timeoutMs: config.timeoutMs,
      connectionPoolSize: config.connectionPoolSize
    });

  const dispatcher = new RequestDispatcher({
    session,
    policy: overrides.retryPolicy ?? defaultRetryPolicy,
    logger,
    defaults: { maxWorkers: config.maxWorkers, isolation: config.isolation }
  });

  const client = new WebDataClient({
    config,
    logger,
    dispatcher,
    zones: new ZoneManager({ session, logger }),
    snapshots: new SnapshotClient({ dispatcher, logger }),
    contentWriter: overrides.contentWriter ?? new FileContentWriter(logger)
  });

  logger.info({
    event: "client.initialized",
    tokenPreview: previewToken(config.apiToken),
    apiBaseUrl: config.apiBaseUrl,
    webUnlockerZone: config.webUnlockerZone,
    serpZone: config.serpZone,
    autoCreateZones: config.autoCreateZones
  });

  await client.init();
  return client;
};

/** Config from the environment, with a .env file loaded first unless `env` is given. */
export const resolveConfigFromEnv = (env?: NodeJS.ProcessEnv): ClientConfigInput => {
  if (env == null) dotenv.config();
  const source = env ?? process.env;
  const base = loadEnv(source);
  const runtime = loadRuntimeConfigFromEnv(source);

  return {
    apiToken: base.API_TOKEN,
    apiBaseUrl: base.API_BASE_URL,
    webUnlockerZone: base.WEB_UNLOCKER_ZONE,
    serpZone: base.SERP_ZONE,
    browserZone: base.BROWSER_ZONE,
    verbose: base.VERBOSE,
    ...runtime
  };
};

export const createClientFromEnv = (
  env?: NodeJS.ProcessEnv,
  overrides: ClientOverrides = {}
): Promise<WebDataClient> => createClient(resolveConfigFromEnv(env), overrides);
