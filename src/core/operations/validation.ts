import { ValidationError } from "../errors";

export const validateUrl = (value: unknown): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError("URL must be a non-empty string");
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ValidationError(`Invalid URL format: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(`URL must use http or https scheme. Received: ${value}`);
  }
  if (parsed.hostname === "") {
    throw new ValidationError("URL must include scheme (http/https) and domain");
  }

  return value;
};

const zoneNamePattern = /^[A-Za-z0-9_-]+$/;

export const validateZoneName = (value: unknown): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError("Zone name must be a non-empty string");
  }
  if (!zoneNamePattern.test(value)) {
    throw new ValidationError("Zone name can only contain letters, numbers, hyphens, and underscores");
  }
  return value;
};

export const validateQuery = (value: unknown): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError("Query must be a non-empty string");
  }
  return value;
};

export const validateApiToken = (value: unknown): string => {
  if (value == null || value === "") {
    throw new ValidationError(
      "API token is required. Provide it as parameter or set BRIGHTDATA_API_TOKEN environment variable"
    );
  }
  if (typeof value !== "string") {
    throw new ValidationError("API token must be a string");
  }
  if (value.trim().length < 10) {
    throw new ValidationError("API token appears to be invalid");
  }
  return value;
};

export const previewToken = (token: string): string =>
  token.length > 8 ? `${token.slice(0, 4)}***${token.slice(-4)}` : "***";

const isList = <T>(value: T | readonly T[]): value is readonly T[] => Array.isArray(value);

export const toNonEmptyList = <T>(value: T | readonly T[], what: string): T[] => {
  const list = isList(value) ? [...value] : [value];
  if (list.length === 0) {
    throw new ValidationError(`${what} list cannot be empty`);
  }
  return list;
};
