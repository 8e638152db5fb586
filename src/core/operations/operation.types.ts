import type { HttpRequest } from "../../ports/HttpSession";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ResponseFormat = "json" | "raw";

/** Decoded body: parsed JSON when requested and parseable, otherwise the raw text. */
export type ResponsePayload = JsonValue | string;

export type OperationLabel = "scrape" | "search";

export type Operation = Readonly<{
  index: number;
  input: string;               // the URL or query the caller passed
  label: OperationLabel;
  request: HttpRequest;
  responseFormat: ResponseFormat;
}>;

export type IsolationPolicy = "isolate" | "fail-fast";

export type BatchItemErrorRecord = {
  name: string;
  code: string;
  message: string;
  status?: number;
};

export type BatchSlot<T> =
  | { status: "fulfilled"; index: number; input: string; value: T }
  | { status: "rejected"; index: number; input: string; error: BatchItemErrorRecord };

export type BatchResult<T> = BatchSlot<T>[];
