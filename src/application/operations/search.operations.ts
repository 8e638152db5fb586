import { ValidationError } from "../../core/errors";
import type { Operation } from "../../core/operations/operation.types";
import { toNonEmptyList, validateQuery, validateZoneName } from "../../core/operations/validation";
import { buildProxyRequest, type RequestDefaults, resolveTimeout, type ScrapeOptions } from "./scrape.operations";

export type SearchEngine = "google" | "bing" | "yandex";

export const searchEngineUrls: Record<SearchEngine, string> = {
  google: "https://www.google.com/search?q=",
  bing: "https://www.bing.com/search?q=",
  yandex: "https://yandex.com/search/?text="
};

const isSearchEngine = (value: string): value is SearchEngine => Object.hasOwn(searchEngineUrls, value);

export type SearchOptions = ScrapeOptions & {
  searchEngine?: SearchEngine;
  parse?: boolean;          // ask the provider for parsed JSON results
};

/** Form encoding: spaces become "+". */
export const encodeQuery = (query: string): string => encodeURIComponent(query).replace(/%20/g, "+");

export const buildSearchUrl = (query: string, engine: SearchEngine, parse: boolean): string =>
  `${searchEngineUrls[engine]}${encodeQuery(query)}${parse ? "&brd_json=1" : ""}`;

export const buildSearchOperations = (
  queries: string | readonly string[],
  options: SearchOptions,
  defaults: RequestDefaults
): Operation[] => {
  const list = toNonEmptyList(queries, "Query");
  const zone = validateZoneName(options.zone ?? defaults.zone);
  const engine = options.searchEngine ?? "google";
  if (!isSearchEngine(engine)) {
    throw new ValidationError(
      `Unsupported search engine: ${String(engine)}. Supported engines: ${Object.keys(searchEngineUrls).join(", ")}`
    );
  }
  list.forEach((query) => validateQuery(query));
  const timeoutMs = resolveTimeout(options, defaults);

  const responseFormat = options.responseFormat ?? "raw";
  return list.map((query, index) => ({
    index,
    input: query,
    label: "search",
    responseFormat,
    request: buildProxyRequest({
      zone,
      url: buildSearchUrl(query, engine, options.parse ?? false),
      responseFormat,
      method: options.method ?? "GET",
      country: options.country ?? "",
      dataFormat: options.dataFormat ?? "html",
      asyncRequest: options.asyncRequest ?? false,
      timeoutMs
    })
  }));
};
