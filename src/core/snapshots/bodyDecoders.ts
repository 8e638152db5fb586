import { DecodeError } from "../errors";
import type { JsonValue } from "../operations/operation.types";
import type { SnapshotData, SnapshotFormat } from "./SnapshotJob";

export type BodyDecoder = {
  name: "text" | "ndjson" | "json";
  accepts: (body: string, format: SnapshotFormat) => boolean;
  /** Throws DecodeError when the body does not have this decoder's shape. */
  decode: (body: string) => SnapshotData;
};

export const parseJson = (text: string): JsonValue => {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (err) {
    throw new DecodeError(`Body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
};

export const looksLikeNdjson = (body: string): boolean => body.includes("\n{") && body.trim().startsWith("{");

const csvDecoder: BodyDecoder = {
  name: "text",
  accepts: (_body, format) => format === "csv",
  decode: (body) => body
};

// Malformed lines are dropped; the rest of the stream is still useful.
const ndjsonDecoder: BodyDecoder = {
  name: "ndjson",
  accepts: (body) => looksLikeNdjson(body),
  decode: (body) =>
    body
      .trim()
      .split("\n")
      .filter((line) => line.trim() !== "")
      .flatMap((line) => {
        try {
          return [parseJson(line)];
        } catch {
          return [];
        }
      })
};

const jsonDecoder: BodyDecoder = {
  name: "json",
  accepts: () => true,
  decode: (body) => parseJson(body)
};

const textFallbackDecoder: BodyDecoder = {
  name: "text",
  accepts: () => true,
  decode: (body) => body
};

/** Tried in order; the first decoder that accepts the body and decodes it wins. */
export const snapshotBodyDecoders: readonly BodyDecoder[] = [
  csvDecoder,
  ndjsonDecoder,
  jsonDecoder,
  textFallbackDecoder
];

export const decodeSnapshotBody = (
  body: string,
  format: SnapshotFormat,
  decoders: readonly BodyDecoder[] = snapshotBodyDecoders
): { decoder: BodyDecoder["name"]; data: SnapshotData } => {
  for (const decoder of decoders) {
    if (!decoder.accepts(body, format)) continue;
    try {
      return { decoder: decoder.name, data: decoder.decode(body) };
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
    }
  }
  return { decoder: "text", data: body };
};
