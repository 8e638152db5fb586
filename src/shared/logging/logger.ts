export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = { event: string } & Record<string, unknown>;

export type Logger = {
  debug(entry: LogEvent): void;
  info(entry: LogEvent): void;
  warn(entry: LogEvent): void;
  error(entry: LogEvent): void;
};

export type LoggerOptions = {
  level: LogLevel;
  verbose: boolean;
  structured: boolean;
};

const levelRank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(levelRank, value);

const formatPlain = (level: LogLevel, entry: LogEvent): string => {
  const { event, ...fields } = entry;
  const rendered = Object.entries(fields)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join(" ");
  return rendered ? `[${level.toUpperCase()}] ${event} ${rendered}` : `[${level.toUpperCase()}] ${event}`;
};

/**
 * One JSON object per line on the console streams.
 * Without `verbose` only warn and error get through, whatever `level` says.
 */
export const createConsoleLogger = (options: LoggerOptions): Logger => {
  const threshold = options.verbose ? levelRank[options.level] : Math.max(levelRank[options.level], levelRank.warn);

  const write = (level: LogLevel, entry: LogEvent) => {
    if (levelRank[level] < threshold) return;
    const line = options.structured ? JSON.stringify({ level, ...entry }) : formatPlain(level, entry);
    /* eslint-disable no-console */
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
    /* eslint-enable no-console */
  };

  return {
    debug: (entry) => write("debug", entry),
    info: (entry) => write("info", entry),
    warn: (entry) => write("warn", entry),
    error: (entry) => write("error", entry)
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
