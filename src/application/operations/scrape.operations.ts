import type { HttpMethod } from "../../ports/HttpSession";
import { assertIntegerInRange, clientCaps } from "../client.config";
import type { Operation, ResponseFormat } from "../../core/operations/operation.types";
import { toNonEmptyList, validateUrl, validateZoneName } from "../../core/operations/validation";

export type ScrapeOptions = {
  zone?: string;
  responseFormat?: ResponseFormat;
  method?: HttpMethod;
  country?: string;
  dataFormat?: string;      // "html", "markdown", "screenshot"
  asyncRequest?: boolean;
  timeoutMs?: number;
};

export type RequestDefaults = {
  zone: string;
  timeoutMs: number;
};

export type ProxyRequestFields = {
  zone: string;
  url: string;
  responseFormat: ResponseFormat;
  method: HttpMethod;
  country: string;
  dataFormat: string;
  asyncRequest: boolean;
  timeoutMs: number;
};

export const buildProxyRequest = (fields: ProxyRequestFields): Operation["request"] => ({
  method: "POST",
  path: "/request",
  query: fields.asyncRequest ? { async: "true" } : undefined,
  body: {
    zone: fields.zone,
    url: fields.url,
    format: fields.responseFormat,
    method: fields.method,
    country: fields.country,
    data_format: fields.dataFormat
  },
  timeoutMs: fields.timeoutMs
});

/** Per-call timeout, held to the same range as the client-wide one. */
export const resolveTimeout = (options: ScrapeOptions, defaults: RequestDefaults): number => {
  if (options.timeoutMs === undefined) return defaults.timeoutMs;
  assertIntegerInRange("timeoutMs", options.timeoutMs, clientCaps.timeoutMs.min, clientCaps.timeoutMs.max);
  return options.timeoutMs;
};

/**
 * Validates every URL and the zone up front, so a bad item fails the call before
 * anything is sent.
 */
export const buildScrapeOperations = (
  urls: string | readonly string[],
  options: ScrapeOptions,
  defaults: RequestDefaults
): Operation[] => {
  const list = toNonEmptyList(urls, "URL");
  const zone = validateZoneName(options.zone ?? defaults.zone);
  list.forEach((url) => validateUrl(url));
  const timeoutMs = resolveTimeout(options, defaults);

  const responseFormat = options.responseFormat ?? "raw";
  return list.map((url, index) => ({
    index,
    input: url,
    label: "scrape",
    responseFormat,
    request: buildProxyRequest({
      zone,
      url,
      responseFormat,
      method: options.method ?? "GET",
      country: options.country ?? "",
      dataFormat: options.dataFormat ?? "html",
      asyncRequest: options.asyncRequest ?? false,
      timeoutMs
    })
  }));
};
