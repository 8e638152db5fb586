import {
  AuthenticationError,
  ClientError,
  ProviderError,
  TransientError,
  TransportFault,
  ValidationError,
  toErrorMessage
} from "../../core/errors";
import {
  type RequiredZones,
  type Zone,
  ZoneListSchema,
  type ZoneProvisioningResult,
  type ZoneType,
  defaultZonePlan,
  isDuplicateZoneResponse
} from "../../core/zones/zone.types";
import type { HttpResponse, HttpSession } from "../../ports/HttpSession";
import type { Logger } from "../../shared/logging/logger";

/**
 * Reads and provisions zones straight through the session. No retries here:
 * provisioning runs once at startup and a failed listing only skips it.
 */
export class ZoneManager {
  constructor(private readonly deps: { session: HttpSession; logger: Logger }) {}

  async listZones(): Promise<Zone[]> {
    let response: HttpResponse;
    try {
      response = await this.deps.session.send({ method: "GET", path: "/zone/get_active_zones" });
    } catch (err) {
      if (err instanceof TransportFault) {
        throw new TransientError({
          message: `Network error while listing zones: ${err.message}`,
          attempts: 1,
          faultKind: err.kind,
          cause: err
        });
      }
      throw err;
    }

    if (response.status === 401) {
      throw new AuthenticationError("Unauthorized (401): Check your API token", response.text);
    }
    if (response.status !== 200) {
      throw new ProviderError({
        code: "zone_list_failed",
        message: `Failed to list zones (${response.status}): ${response.text}`,
        status: response.status,
        body: response.text
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(response.text);
    } catch (err) {
      throw new ProviderError({
        code: "invalid_response",
        message: `Invalid JSON response from zones API: ${toErrorMessage(err)}`,
        status: response.status
      });
    }

    const parsed = ZoneListSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError({
        code: "invalid_response",
        message: `Unexpected response format from zones API: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        status: response.status
      });
    }
    return parsed.data ?? [];
  }

  /**
   * Creates every required zone the account does not have yet. A failed listing is
   * logged and skips provisioning; a failed creation is fatal.
   */
  async ensureRequiredZones(required: RequiredZones): Promise<ZoneProvisioningResult> {
    const { logger } = this.deps;

    let active: Zone[];
    try {
      active = await this.listZones();
    } catch (err) {
      if (!(err instanceof ClientError)) throw err;
      logger.warn({
        event: "zones.provisioning_skipped",
        code: err.code,
        status: err.status ?? null,
        reason: err.message
      });
      return { existing: [], created: [], skipped: true };
    }

    const activeNames = new Set(active.map((zone) => zone.name));
    const existing: string[] = [];
    const created: string[] = [];

    for (const [name, type] of Object.entries(required)) {
      if (activeNames.has(name)) {
        existing.push(name);
        continue;
      }
      const outcome = await this.createZone(name, type);
      if (outcome === "created") created.push(name);
      else existing.push(name);
    }

    return { existing, created, skipped: false };
  }

  /** Idempotent on the zone name: a duplicate-name rejection counts as success. */
  async createZone(name: string, type: ZoneType): Promise<"created" | "already_exists"> {
    if (name.trim() === "") {
      throw new ValidationError("Zone name must be a non-empty string");
    }

    let response: HttpResponse;
    try {
      response = await this.deps.session.send({
        method: "POST",
        path: "/zone",
        body: { zone: { name, type }, plan: defaultZonePlan }
      });
    } catch (err) {
      throw new ProviderError({
        code: "zone_create_failed",
        message: `Failed to create zone ${name}: ${toErrorMessage(err)}`,
        cause: err
      });
    }

    if (response.status === 200 || response.status === 201) {
      this.deps.logger.info({ event: "zones.created", zone: name, type });
      return "created";
    }
    if (isDuplicateZoneResponse(response.text)) {
      this.deps.logger.info({ event: "zones.already_exists", zone: name, type });
      return "already_exists";
    }

    throw new ProviderError({
      code: "zone_create_failed",
      message: `Failed to create zone ${name}: ${response.text}`,
      status: response.status,
      body: response.text
    });
  }
}
