import type { BatchResult, ResponsePayload } from "../core/operations/operation.types";
import type { SnapshotData, SnapshotDownloadOptions, SnapshotJob, SnapshotTriggerItem } from "../core/snapshots/SnapshotJob";
import type { RequiredZones, Zone, ZoneProvisioningResult, ZoneType } from "../core/zones/zone.types";
import type { ContentWriter, WriteContentOptions } from "../ports/ContentWriter";
import type { Logger } from "../shared/logging/logger";
import type { ClientConfig } from "./client.config";
import type { BatchOptions, RequestDispatcher } from "./dispatch/RequestDispatcher";
import { buildScrapeOperations, type ScrapeOptions } from "./operations/scrape.operations";
import { buildSearchOperations, type SearchOptions } from "./operations/search.operations";
import { CHATGPT_DATASET_ID, buildPromptItems, type PromptOptions } from "./snapshots/promptItems";
import type { SnapshotClient } from "./snapshots/SnapshotClient";
import type { ZoneManager } from "./zones/ZoneManager";

export type WebDataClientDeps = {
  config: ClientConfig;
  logger: Logger;
  dispatcher: RequestDispatcher;
  zones: ZoneManager;
  snapshots: SnapshotClient;
  contentWriter: ContentWriter;
};

export type BatchCallOptions = Partial<BatchOptions>;

export class WebDataClient {
  private provisioning?: Promise<ZoneProvisioningResult>;

  constructor(private readonly deps: WebDataClientDeps) {}

  get config(): Readonly<ClientConfig> {
    return this.deps.config;
  }

  requiredZones(): RequiredZones {
    const { webUnlockerZone, serpZone, browserZone } = this.deps.config;
    const required: Record<string, ZoneType> = {
      [webUnlockerZone]: "unblocker",
      [serpZone]: "serp"
    };
    if (browserZone != null) required[browserZone] = "unblocker";
    return required;
  }

  /**
   * Zone provisioning, once per client, before the first request. Concurrent callers share
   * the in-flight run; a failed run is forgotten so the next call tries again.
   */
  init(): Promise<ZoneProvisioningResult | undefined> {
    if (!this.deps.config.autoCreateZones) return Promise.resolve(undefined);
    if (this.provisioning == null) {
      this.provisioning = this.deps.zones.ensureRequiredZones(this.requiredZones()).catch((err: unknown) => {
        this.provisioning = undefined;
        throw err;
      });
    }
    return this.provisioning;
  }

  scrape(url: string, options?: ScrapeOptions): Promise<ResponsePayload>;
  scrape(urls: readonly string[], options?: ScrapeOptions & BatchCallOptions): Promise<BatchResult<ResponsePayload>>;
  async scrape(
    url: string | readonly string[],
    options: ScrapeOptions & BatchCallOptions = {}
  ): Promise<ResponsePayload | BatchResult<ResponsePayload>> {
    const operations = buildScrapeOperations(url, options, this.requestDefaults(this.deps.config.webUnlockerZone));
    if (typeof url === "string") return this.deps.dispatcher.execute(operations[0]);
    return this.deps.dispatcher.executeBatch(operations, options);
  }

  search(query: string, options?: SearchOptions): Promise<ResponsePayload>;
  search(queries: readonly string[], options?: SearchOptions & BatchCallOptions): Promise<BatchResult<ResponsePayload>>;
  async search(
    query: string | readonly string[],
    options: SearchOptions & BatchCallOptions = {}
  ): Promise<ResponsePayload | BatchResult<ResponsePayload>> {
    const operations = buildSearchOperations(query, options, this.requestDefaults(this.deps.config.serpZone));
    if (typeof query === "string") return this.deps.dispatcher.execute(operations[0]);
    return this.deps.dispatcher.executeBatch(operations, options);
  }

  triggerSnapshot(datasetId: string, items: readonly SnapshotTriggerItem[]): Promise<SnapshotJob> {
    return this.deps.snapshots.trigger(datasetId, items);
  }

  /** Prompts go to the ChatGPT dataset; download the result later with the returned id. */
  async scrapeChatGpt(prompt: string | readonly string[], options: PromptOptions = {}): Promise<SnapshotJob> {
    const items = buildPromptItems(prompt, options);
    const job = await this.deps.snapshots.trigger(CHATGPT_DATASET_ID, items);
    this.deps.logger.info({ event: "snapshot.prompts_submitted", snapshotId: job.snapshotId, prompts: items.length });
    return job;
  }

  downloadSnapshot(snapshotId: string, options?: SnapshotDownloadOptions): Promise<SnapshotData> {
    return this.deps.snapshots.download(snapshotId, options);
  }

  listZones(): Promise<Zone[]> {
    return this.deps.zones.listZones();
  }

  downloadContent(content: unknown, options?: WriteContentOptions): Promise<string> {
    return this.deps.contentWriter.write(content, options);
  }

  private requestDefaults(zone: string) {
    return { zone, timeoutMs: this.deps.config.timeoutMs };
  }
}
