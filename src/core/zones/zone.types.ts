import { z } from "zod";

/** "unblocker" serves web unlocking and browser automation, "serp" serves search. */
export type ZoneType = "unblocker" | "serp";

export const ZoneSchema = z.looseObject({
  name: z.string(),
  type: z.string().optional()
});

export const ZoneListSchema = z.array(ZoneSchema).nullable();

export type Zone = z.infer<typeof ZoneSchema>;

export type RequiredZones = Readonly<Record<string, ZoneType>>;

export type ZoneProvisioningResult = {
  existing: string[];
  created: string[];
  skipped: boolean;             // listing failed, nothing was provisioned
};

export const defaultZonePlan = {
  type: "static",
  ips_type: "shared",
  bandwidth: "1",
  ip_alloc_preset: "shared_block",
  ips: 0,
  country: "any",
  country_city: "any",
  mobile: "false",
  serp: "false",
  city: "false",
  asn: "false",
  vip: "false",
  vips_type: "shared",
  vips: "0",
  vip_country: "any",
  vip_country_city: "any",
  ub_premium: false,
  solve_captcha_disable: true,
  custom_headers: false
} as const;

const duplicateZoneSignals = ["duplicate zone name", "already exists"];

export const isDuplicateZoneResponse = (body: string): boolean => {
  const normalized = body.toLowerCase();
  return duplicateZoneSignals.some((signal) => normalized.includes(signal));
};
