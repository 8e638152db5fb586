export type Env = {
  API_TOKEN: string;
  API_BASE_URL: string;
  WEB_UNLOCKER_ZONE?: string;
  SERP_ZONE?: string;
  BROWSER_ZONE?: string;
  VERBOSE: boolean;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const optional = (value: string | undefined): string | undefined =>
  value != null && value.trim() !== "" ? value.trim() : undefined;

const truthy = new Set(["true", "1", "yes", "on"]);

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const API_TOKEN = env.BRIGHTDATA_API_TOKEN ?? "";
  const API_BASE_URL = validateHttpUrl("API_BASE_URL", env.API_BASE_URL ?? "https://api.brightdata.com");
  const VERBOSE = truthy.has((env.BRIGHTDATA_VERBOSE ?? "").trim().toLowerCase());

  return {
    API_TOKEN,
    API_BASE_URL,
    WEB_UNLOCKER_ZONE: optional(env.WEB_UNLOCKER_ZONE),
    SERP_ZONE: optional(env.SERP_ZONE),
    BROWSER_ZONE: optional(env.BROWSER_ZONE),
    VERBOSE
  };
};
