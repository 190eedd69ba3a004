/**
 * packages/node/src/ndjsonSink.ts — Log sink writing one JSON object per line.
 *
 * Why: The console is the screen the game draws on, so file logging is the
 * only way to watch a running session. Appends are synchronous so a crash
 * still leaves every record written before it.
 */

import { appendFileSync } from "node:fs";
import type { LogRecord, LogSink } from "@glyphbox/core";

export type NdjsonSinkOptions = Readonly<{
  /** Seconds since the epoch; defaults to the wall clock. */
  now?: () => number;
}>;

export function formatNdjsonLine(record: LogRecord, time: number): string {
  const line: Record<string, unknown> = {
    time,
    level: record.level,
    scope: record.scope,
    message: record.message,
  };
  if (record.detail !== undefined) line["detail"] = record.detail;
  return `${JSON.stringify(line)}\n`;
}

export function createNdjsonSink(path: string, opts: NdjsonSinkOptions = {}): LogSink {
  const now = opts.now ?? (() => Date.now() / 1000);
  return (record) => {
    appendFileSync(path, formatNdjsonLine(record, now()), "utf8");
  };
}
