export type HttpMethod = "GET" | "POST";

export type QueryValue = string | number | boolean | undefined;

export type HttpRequest = {
  method: HttpMethod;
  path: string;                                // joined onto the session base URL
  query?: Readonly<Record<string, QueryValue>>; // undefined values are dropped
  body?: unknown;                              // sent as JSON
  timeoutMs?: number;                          // per attempt; session default otherwise
};

export type HttpResponse = {
  status: number;
  text: string;
  url: string;                                 // sanitized, safe to log
};

/**
 * One shared session per client. Implementations must be safe for concurrent use
 * and must throw TransportFault when no response was received.
 */
export interface HttpSession {
  send(request: HttpRequest): Promise<HttpResponse>;
}
