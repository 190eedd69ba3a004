/**
 * packages/core/src/logging.ts — Scoped, leveled logger with a pluggable sink.
 *
 * Why: The core never writes to the terminal it is drawing on. Diagnostics go
 * through a sink the host chooses: the console by default, an NDJSON file in
 * the node package, or a recording array in tests.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogRecord = Readonly<{
  level: LogLevel;
  scope: string;
  message: string;
  detail?: Readonly<Record<string, unknown>>;
}>;

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, detail?: Readonly<Record<string, unknown>>): void;
  info(message: string, detail?: Readonly<Record<string, unknown>>): void;
  warn(message: string, detail?: Readonly<Record<string, unknown>>): void;
  error(message: string, detail?: Readonly<Record<string, unknown>>): void;
  child(scope: string): Logger;
}

export type LoggerOptions = Readonly<{
  sink?: LogSink;
  minLevel?: LogLevel;
  scope?: string;
}>;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
});

export function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

export function formatLogLine(record: LogRecord): string {
  const head = `[glyphbox][${record.scope}] ${record.message}`;
  if (record.detail === undefined) return head;
  return `${head} ${JSON.stringify(record.detail)}`;
}

export const consoleSink: LogSink = (record) => {
  const c = globalThis.console;
  const line = formatLogLine(record);
  switch (record.level) {
    case "debug":
      c?.debug?.(line);
      return;
    case "info":
      c?.info?.(line);
      return;
    case "warn":
      c?.warn?.(line);
      return;
    case "error":
      c?.error?.(line);
      return;
  }
};

class ScopedLogger implements Logger {
  readonly scope: string;
  private readonly sink: LogSink;
  private readonly minRank: number;

  constructor(sink: LogSink, minRank: number, scope: string) {
    this.sink = sink;
    this.minRank = minRank;
    this.scope = scope;
  }

  debug(message: string, detail?: Readonly<Record<string, unknown>>): void {
    this.emit("debug", message, detail);
  }

  info(message: string, detail?: Readonly<Record<string, unknown>>): void {
    this.emit("info", message, detail);
  }

  warn(message: string, detail?: Readonly<Record<string, unknown>>): void {
    this.emit("warn", message, detail);
  }

  error(message: string, detail?: Readonly<Record<string, unknown>>): void {
    this.emit("error", message, detail);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.sink, this.minRank, `${this.scope}:${scope}`);
  }

  private emit(
    level: LogLevel,
    message: string,
    detail: Readonly<Record<string, unknown>> | undefined,
  ): void {
    if (LEVEL_RANK[level] < this.minRank) return;
    this.sink(
      detail === undefined
        ? Object.freeze({ level, scope: this.scope, message })
        : Object.freeze({ level, scope: this.scope, message, detail }),
    );
  }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return new ScopedLogger(
    opts.sink ?? consoleSink,
    LEVEL_RANK[opts.minLevel ?? "warn"],
    opts.scope ?? "core",
  );
}

export const silentSink: LogSink = () => undefined;

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: Logger = createLogger({ sink: silentSink, minLevel: "error" });
