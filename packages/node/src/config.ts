/**
 * packages/node/src/config.ts — Environment-driven settings for Node hosts.
 *
 * Why: A game started from a shell is tuned through the environment rather
 * than code changes. Malformed values fall back to defaults instead of
 * aborting start-up; the loop still validates what it is finally given.
 */

import { DEFAULT_LOOP_CONFIG, type LogLevel, isLogLevel } from "@glyphbox/core";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export const ENV_FPS = "GLYPHBOX_FPS";
export const ENV_LOG = "GLYPHBOX_LOG";
export const ENV_LOG_LEVEL = "GLYPHBOX_LOG_LEVEL";
export const ENV_NO_ALT_SCREEN = "GLYPHBOX_NO_ALT_SCREEN";
export const ENV_NO_COLOR = "NO_COLOR";

export type NodeTerminalConfig = Readonly<{
  fps: number;
  /** NDJSON log file; null keeps logs on the console sink. */
  logPath: string | null;
  logLevel: LogLevel;
  altScreen: boolean;
  color: boolean;
}>;

/** Trimmed value, or null when unset or blank. */
export function readEnv(env: EnvMap, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function envFlag(env: EnvMap, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  if (norm === "1" || norm === "true" || norm === "yes" || norm === "on") return true;
  if (norm === "0" || norm === "false" || norm === "no" || norm === "off") return false;
  return fallback;
}

export function envPositiveInt(env: EnvMap, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function resolveNodeTerminalConfig(env: EnvMap = process.env): NodeTerminalConfig {
  const level = readEnv(env, ENV_LOG_LEVEL)?.toLowerCase();
  return Object.freeze({
    fps: envPositiveInt(env, ENV_FPS, DEFAULT_LOOP_CONFIG.fps),
    logPath: readEnv(env, ENV_LOG),
    logLevel: isLogLevel(level) ? level : "warn",
    altScreen: !envFlag(env, ENV_NO_ALT_SCREEN),
    // Any non-empty NO_COLOR disables color, whatever its value.
    color: readEnv(env, ENV_NO_COLOR) === null,
  });
}
