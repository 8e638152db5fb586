import { writeFile } from "node:fs/promises";
import { ProviderError, toErrorMessage } from "../../core/errors";
import type { ContentFormat, ContentWriter, WriteContentOptions } from "../../ports/ContentWriter";
import type { Logger } from "../../shared/logging/logger";

const pad = (value: number) => String(value).padStart(2, "0");

/** Local time, YYYYMMDD_HHMMSS. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseBodyField = (item: unknown): unknown => {
  if (!isRecord(item) || typeof item.body !== "string") return item;
  const body = item.body.trim();
  if (!body.startsWith("{") && !body.startsWith("[")) return item;
  try {
    const parsed: unknown = JSON.parse(body);
    return { ...item, body: parsed };
  } catch {
    return item;
  }
};

/** Turns JSON-looking string `body` fields into values, leaving everything else as it is. */
export const parseBodyFields = (content: unknown): unknown =>
  Array.isArray(content) ? content.map(parseBodyField) : parseBodyField(content);

export const serializeContent = (content: unknown, format: ContentFormat): string => {
  if (typeof content === "string") return content;
  if (content === undefined) return "";
  if ((format === "ndjson" || format === "jsonl") && Array.isArray(content)) {
    return content.map((item) => JSON.stringify(item)).join("\n");
  }
  return JSON.stringify(content, null, 2);
};

export class FileContentWriter implements ContentWriter {
  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async write(content: unknown, options: WriteContentOptions = {}): Promise<string> {
    const format = options.format ?? "json";
    let filename = options.filename ?? `results_${formatTimestamp(this.now())}.${format}`;
    if (!filename.endsWith(`.${format}`)) filename = `${filename}.${format}`;

    const prepared = options.parseBody ? parseBodyFields(content) : content;
    const text = serializeContent(prepared, format);

    try {
      await writeFile(filename, text, "utf-8");
    } catch (err) {
      throw new ProviderError({
        code: "content_write_failed",
        message: `Failed to write file ${filename}: ${toErrorMessage(err)}`,
        cause: err
      });
    }

    this.logger.info({ event: "content.written", filename, format, bytes: Buffer.byteLength(text, "utf-8") });
    return filename;
  }
}
