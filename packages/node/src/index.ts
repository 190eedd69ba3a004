/**
 * @glyphbox/node
 *
 * Node.js bindings for @glyphbox/core: the ANSI terminal backend, environment
 * settings, file logging and ASCII-art loading from disk.
 */

export {
  AnsiBackend,
  type AnsiBackendOptions,
  type AnsiInput,
  type AnsiOutput,
  CLEAR_SCREEN,
  DISABLE_MOUSE,
  ENABLE_MOUSE,
  ENTER_ALT_SCREEN,
  HIDE_CURSOR,
  LEAVE_ALT_SCREEN,
  RESET_ATTRIBUTES,
  SHOW_CURSOR,
  detectWindowSize,
} from "./ansiBackend.js";
export { type Rgb, parseColor, sgrForeground } from "./colors.js";
export { InputDecoder, type InputToken, type MouseButton } from "./inputDecoder.js";
export {
  ENV_FPS,
  ENV_LOG,
  ENV_LOG_LEVEL,
  ENV_NO_ALT_SCREEN,
  ENV_NO_COLOR,
  type EnvMap,
  type NodeTerminalConfig,
  envFlag,
  envPositiveInt,
  readEnv,
  resolveNodeTerminalConfig,
} from "./config.js";
export { type NdjsonSinkOptions, createNdjsonSink, formatNdjsonLine } from "./ndjsonSink.js";
export { TxtLoader, type TxtLoaderOptions, loadAtlas, parseTxtImage } from "./txtLoader.js";
export { type NodeTerminal, type NodeTerminalOptions, createNodeTerminal, defaultLogSink } from "./runtime.js";
