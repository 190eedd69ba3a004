/**
 * @glyphbox/core
 *
 * Runtime-agnostic core: event dispatcher, widget compositing, entity-component
 * system, serialization and the terminal facade over an abstract backend.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export {
  GlyphError,
  type GlyphErrorCode,
  backendError,
  describeValue,
  dispatchError,
  ecsError,
  invalidConfig,
  isGlyphError,
  layoutError,
  serializationError,
} from "./errors.js";

export {
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
  type LoggerOptions,
  consoleSink,
  createLogger,
  formatLogLine,
  isLogLevel,
  silentLogger,
  silentSink,
} from "./logging.js";

// =============================================================================
// Geometry
// =============================================================================

export {
  type CellImage,
  type CharGrid,
  type ColorGrid,
  type Grid,
  type Vec2,
  assertImageShape,
  blit,
  charsFromRows,
  cloneGrid,
  copyShape,
  fillGrid,
  gridSize,
  gridWidth,
  isGrid,
  rotateGrid,
  rowsFromChars,
  shapesEqual,
  sliceGrid,
} from "./geometry/grid.js";
export { boxInside, isIntVec2, rangesIntersect, rectanglesCollide } from "./geometry/rect.js";
export { roundHalfEven } from "./geometry/rounding.js";
export { type BoxStyle, generateBox } from "./geometry/box.js";

// =============================================================================
// Events
// =============================================================================

export {
  BUILTIN_EVENT_TYPES,
  type BuiltinEvent,
  type BuiltinEventMap,
  type BuiltinEventType,
  type DispatchResult,
  type EntityCollision,
  type EntityPosition,
  type EventSelector,
  type EventValue,
  type GlyphEvent,
  type Listener,
  type ServiceSignal,
  type TextInput,
  createEvent,
  isEventList,
  isEventOf,
  isEventRecord,
  isListener,
  isService,
  isTickOver,
  toEventList,
} from "./events/types.js";
export { EventDispatcher, type EventDispatcherOptions } from "./events/dispatcher.js";

// =============================================================================
// Widgets
// =============================================================================

export { type FlipAxis, Widget, type WidgetParent, type WidgetSurface } from "./widgets/widget.js";
export { type ImageSet, SwitchingWidget } from "./widgets/switchingWidget.js";
export { Layout } from "./widgets/layout.js";
export {
  InputScrollable,
  type InputScrollableOptions,
  ScrollBar,
  type ScrollBarOptions,
  type ScrollBarOrientation,
  ScrollableLayout,
  type ViewOptions,
  ViewWindow,
} from "./widgets/scrollable.js";
export {
  Animation,
  type MultipleAnimationOptions,
  MultipleAnimationWidget,
  type SimpleAnimationOptions,
  SimpleAnimationWidget,
} from "./widgets/animation.js";
export {
  InputField,
  type InputFieldOptions,
  type Justification,
  type KeyStroke,
  Label,
  type LabelOptions,
  isJustification,
  keyForChar,
  renderText,
} from "./widgets/label.js";
export { FPSCounter, MousePosWidget } from "./widgets/counters.js";
export {
  type MenuAction,
  MenuItem,
  type MenuItemOptions,
  MenuWidget,
  type MenuWidgetOptions,
} from "./widgets/menu.js";
export {
  ClosingListener,
  LoggingListener,
  type LoggingListenerOptions,
  type TextSink,
  formatEventValue,
} from "./widgets/listeners.js";

// =============================================================================
// Entity-component system
// =============================================================================

export { Component, type ComponentClass } from "./ecs/component.js";
export { Entity, type EntityRecord, RESERVED_SLOTS } from "./ecs/entity.js";
export { EntityTracker } from "./ecs/tracker.js";
export { SwitchWidgetComponent, WidgetComponent } from "./ecs/widgetComponent.js";
export { PositionComponent, type PositionOptions } from "./ecs/position.js";
export {
  CollisionComponent,
  type CollisionOptions,
  WalkerCollisionComponent,
  type WalkerCollisionOptions,
} from "./ecs/collision.js";
export { DestructorComponent } from "./ecs/destructor.js";
export { DecayComponent, type DecayOptions, type DestroyCondition } from "./ecs/decay.js";
export { ECSLayout, type ECSLayoutOptions, ScrollableECSLayout } from "./ecs/ecsLayout.js";
export { type Hitbox, LayeredECSLayout, hitboxesCollide } from "./ecs/layeredLayout.js";

// =============================================================================
// Serialization
// =============================================================================

export {
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  type SerialRecord,
  type Serializable,
  isJsonObject,
} from "./serial/types.js";
export { type ConverterName, type DecodedValue, convert, isConverterName } from "./serial/converters.js";
export { FieldReader, isDecodedSet } from "./serial/fields.js";
export {
  type ComponentFactory,
  type DecodeContext,
  FORBIDDEN_KEYS,
  type SerialInput,
  SerialRegistry,
  type WidgetFactory,
  decodeImage,
} from "./serial/registry.js";
export { createDefaultRegistry, registerBuiltins } from "./serial/builtins.js";

// =============================================================================
// Image sources
// =============================================================================

export {
  type AtlasElement,
  type ElementSource,
  GridImageSource,
  ImageAtlas,
  type ImageSource,
  isAtlasElement,
  regionOf,
} from "./resources/imageSource.js";

// =============================================================================
// Terminal facade and loop
// =============================================================================

export type { TerminalBackend } from "./terminal/backend.js";
export { type Cell, LayeredCellBuffer } from "./terminal/cellBuffer.js";
export {
  DEFAULT_LOOP_CONFIG,
  type LoopConfig,
  TERMINAL_OPTION_SECTIONS,
  type TerminalOptionValue,
  type TerminalOptions,
  renderTerminalOptions,
  requirePositiveInt,
  resolveLoopConfig,
} from "./terminal/config.js";
export {
  type DecodedInput,
  type InputCodeKind,
  KEY_CODES,
  MISC_CODES,
  STATE_CODES,
  TK_KEY_RELEASED,
  decodeInput,
  keyCode,
  miscCode,
  releaseCode,
  stateCode,
} from "./terminal/keyCodes.js";
export { MAX_LAYERS, Terminal, type TerminalConfig, type WidgetLocation } from "./terminal/terminal.js";
export { GlyphLoop, type GlyphLoopOptions, type LoopClock, systemClock } from "./terminal/loop.js";
