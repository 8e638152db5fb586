export type ContentFormat = "json" | "csv" | "ndjson" | "jsonl" | "txt";

export type WriteContentOptions = {
  filename?: string;
  format?: ContentFormat;
  parseBody?: boolean;
};

export interface ContentWriter {
  write(content: unknown, options?: WriteContentOptions): Promise<string>;
}
