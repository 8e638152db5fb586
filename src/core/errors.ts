export type ClientErrorCode =
  | "validation_failed"
  | "bad_request"
  | "authentication_failed"
  | "forbidden"
  | "not_found"
  | "retries_exhausted"
  | "provider_error"
  | "invalid_response"
  | "zone_list_failed"
  | "zone_create_failed"
  | "snapshot_trigger_failed"
  | "snapshot_download_failed"
  | "content_write_failed"
  | "batch_item_failed";

type ClientErrorArgs = {
  code: ClientErrorCode;
  message: string;
  status?: number;
  body?: string;
  cause?: unknown;
};

export class ClientError extends Error {
  readonly code: ClientErrorCode;
  readonly status?: number;
  readonly body?: string;

  constructor(args: ClientErrorArgs) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "ClientError";
    this.code = args.code;
    this.status = args.status;
    this.body = args.body;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed input, raised before any network activity. */
export class ValidationError extends ClientError {
  constructor(message: string) {
    super({ code: "validation_failed", message });
    this.name = "ValidationError";
  }
}

export class BadRequestError extends ClientError {
  constructor(body: string) {
    super({ code: "bad_request", message: `Bad Request (400): ${body}`, status: 400, body });
    this.name = "BadRequestError";
  }
}

export class AuthenticationError extends ClientError {
  constructor(message = "Invalid API token or insufficient permissions", body?: string) {
    super({ code: "authentication_failed", message, status: 401, body });
    this.name = "AuthenticationError";
  }
}

export class AuthorizationError extends ClientError {
  constructor(body: string) {
    super({ code: "forbidden", message: `Forbidden (403): Insufficient permissions. ${body}`, status: 403, body });
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends ClientError {
  constructor(message: string, body?: string) {
    super({ code: "not_found", message, status: 404, body });
    this.name = "NotFoundError";
  }
}

export type TransportFaultKind = "timeout" | "connection" | "network";

/**
 * Retry budget exhausted on a retryable status or transport fault.
 * `status` is set for the former, `faultKind` for the latter.
 */
export class TransientError extends ClientError {
  readonly attempts: number;
  readonly faultKind?: TransportFaultKind;

  constructor(args: { message: string; attempts: number; status?: number; faultKind?: TransportFaultKind; cause?: unknown }) {
    super({ code: "retries_exhausted", message: args.message, status: args.status, cause: args.cause });
    this.name = "TransientError";
    this.attempts = args.attempts;
    this.faultKind = args.faultKind;
  }
}

export class ProviderError extends ClientError {
  constructor(args: { message: string; code?: ClientErrorCode; status?: number; body?: string; cause?: unknown }) {
    super({ ...args, code: args.code ?? "provider_error" });
    this.name = "ProviderError";
  }
}

/** Fail-fast batch wrapper naming the input that broke the batch. */
export class BatchItemError extends ClientError {
  readonly index: number;
  readonly input: string;

  constructor(args: { message: string; index: number; input: string; cause: unknown }) {
    const status = args.cause instanceof ClientError ? args.cause.status : undefined;
    super({ code: "batch_item_failed", message: args.message, status, cause: args.cause });
    this.name = "BatchItemError";
    this.index = args.index;
    this.input = args.input;
  }
}

/** A body that could not be read in the requested format. Recovered by the caller. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** Raised by the HTTP session when no response was received. */
export class TransportFault extends Error {
  readonly kind: TransportFaultKind;

  constructor(kind: TransportFaultKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TransportFault";
    this.kind = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/** Maps a fatal (non-retryable, non-2xx) status to the error taxonomy. */
export const errorForStatus = (status: number, body: string): ClientError => {
  switch (status) {
    case 400:
      return new BadRequestError(body);
    case 401:
      return new AuthenticationError(`Unauthorized (401): Check your API token. ${body}`, body);
    case 403:
      return new AuthorizationError(body);
    case 404:
      return new NotFoundError(`Not Found (404): ${body}`, body);
    default:
      return new ProviderError({ message: `API Error (${status}): ${body}`, status, body });
  }
};
