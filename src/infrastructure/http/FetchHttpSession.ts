import { TransportFault, type TransportFaultKind } from "../../core/errors";
import type { HttpRequest, HttpResponse, HttpSession } from "../../ports/HttpSession";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";

export type FetchHttpSessionOptions = {
  baseUrl: string;
  apiToken: string;
  userAgent: string;
  timeoutMs: number;
  connectionPoolSize: number;
  fetchFn?: typeof fetch;
};

const connectionErrorCodes = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT"
]);

const errorCodeOf = (value: unknown): string | undefined => {
  if (typeof value !== "object" || value == null || !("code" in value)) return undefined;
  return typeof value.code === "string" ? value.code : undefined;
};

const classifyFetchFailure = (err: unknown): TransportFaultKind => {
  const code = errorCodeOf(err) ?? (err instanceof Error ? errorCodeOf(err.cause) : undefined);
  return code != null && connectionErrorCodes.has(code) ? "connection" : "network";
};

/**
 * Shared HTTP session on Node's fetch. Carries the auth headers, applies the per-attempt
 * timeout and caps in-flight requests at `connectionPoolSize`.
 */
export class FetchHttpSession implements HttpSession {
  private readonly limit: Limiter;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: FetchHttpSessionOptions) {
    this.limit = createLimiter(options.connectionPoolSize);
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(this.options.baseUrl);
    const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${basePath}${request.path.startsWith("/") ? request.path : `/${request.path}`}`;
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    const safeRequestUrl = `${url.origin}${url.pathname}`;
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;

    return this.limit(async () => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const res = await this.fetchFn(url.toString(), {
          method: request.method,
          headers: {
            Authorization: `Bearer ${this.options.apiToken}`,
            "Content-Type": "application/json",
            "User-Agent": this.options.userAgent
          },
          body: request.body === undefined ? undefined : JSON.stringify(request.body),
          signal: controller.signal
        });
        const text = await res.text();
        return { status: res.status, text, url: safeRequestUrl };
      } catch (err) {
        if (controller.signal.aborted) {
          throw new TransportFault("timeout", `Request timeout after ${timeoutMs}ms: ${safeRequestUrl}`, err);
        }
        const message = err instanceof Error ? err.message : String(err);
        throw new TransportFault(classifyFetchFailure(err), `${message}: ${safeRequestUrl}`, err);
      } finally {
        clearTimeout(timeout);
      }
    });
  }
}
