/**
 * packages/node/src/runtime.ts — One-call wiring of a terminal for Node hosts.
 *
 * Why: Every Node program needs the same chain: settings from the
 * environment, a logger that does not write over the screen, the ANSI
 * backend and a Terminal over it. The loop is left to the caller, which owns
 * the dispatcher.
 */

import {
  type GlyphLoopOptions,
  type LogSink,
  type Logger,
  Terminal,
  type TerminalOptions,
  type Vec2,
  createLogger,
  silentSink,
} from "@glyphbox/core";
import { AnsiBackend, type AnsiInput, type AnsiOutput } from "./ansiBackend.js";
import { type EnvMap, type NodeTerminalConfig, resolveNodeTerminalConfig } from "./config.js";
import { createNdjsonSink } from "./ndjsonSink.js";

export type NodeTerminalOptions = Readonly<{
  env?: EnvMap;
  input?: AnsiInput | null;
  output?: AnsiOutput;
  size?: Vec2;
  options?: TerminalOptions;
  defaultColor?: string;
  /** Overrides the sink chosen from `GLYPHBOX_LOG` (see `defaultLogSink`). */
  sink?: LogSink;
}>;

export type NodeTerminal = Readonly<{
  config: NodeTerminalConfig;
  logger: Logger;
  backend: AnsiBackend;
  terminal: Terminal;
  /** Ready for `new GlyphLoop(terminal, dispatcher, loopOptions)`. */
  loopOptions: GlyphLoopOptions;
}>;

/**
 * The sink used when none is passed in. Without a log file, records are
 * dropped: the console is the screen the backend draws on.
 */
export function defaultLogSink(logPath: string | null): LogSink {
  return logPath === null ? silentSink : createNdjsonSink(logPath);
}

export function createNodeTerminal(opts: NodeTerminalOptions = {}): NodeTerminal {
  const config = resolveNodeTerminalConfig(opts.env ?? process.env);
  const sink = opts.sink ?? defaultLogSink(config.logPath);
  const logger = createLogger({ sink, minLevel: config.logLevel, scope: "node" });
  const backend = new AnsiBackend({
    input: opts.input,
    output: opts.output,
    size: opts.size,
    altScreen: config.altScreen,
    color: config.color,
    defaultColor: opts.defaultColor,
    logger,
  });
  const terminal = new Terminal(backend, {
    options: opts.options,
    defaultColor: opts.defaultColor,
    logger: logger.child("terminal"),
  });
  logger.debug("terminal configured", { fps: config.fps, logPath: config.logPath, color: config.color });
  return Object.freeze({
    config,
    logger,
    backend,
    terminal,
    loopOptions: Object.freeze({ fps: config.fps, logger: logger.child("loop") }),
  });
}
