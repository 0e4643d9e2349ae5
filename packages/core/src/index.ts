/**
 * @skein-tui/core
 *
 * Cross-thread scheduling core for terminal UIs: notifier, event queue,
 * cancellable threads and pools, the main loop, the application shell, and
 * ordered object containers.
 *
 * Node-only APIs used here are node:async_hooks (thread identity) and
 * `process` (log level, stderr). Terminal I/O lives in @skein-tui/node.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  SkeinError,
  type SkeinErrorCode,
  invalidArgument,
  isSkeinError,
  toError,
} from "./errors.js";

// =============================================================================
// Logging
// =============================================================================

export {
  type LogFields,
  type LogLevel,
  type LogLevelSetting,
  type LogSink,
  type Logger,
  createLogger,
  getLogLevel,
  parseLogLevel,
  setLogLevel,
  setLogSink,
} from "./debug/logger.js";

// =============================================================================
// Concurrency
// =============================================================================

export * from "./concurrency/index.js";

// =============================================================================
// Main loop
// =============================================================================

export { AlarmHeap, type AlarmEntry } from "./loop/alarmHeap.js";
export { EventLoop, type EventLoopOptions } from "./loop/eventLoop.js";
export type {
  AlarmCallback,
  AlarmToken,
  InputHandler,
  InputSource,
  LoopExit,
  MainLoop,
  Screen,
  WatchToken,
} from "./loop/types.js";

// =============================================================================
// Application shell
// =============================================================================

export { CallbackHandle, type SchedulerHost } from "./app/callbackHandle.js";
export {
  DEFAULT_AUTO_REFRESH_MS,
  DEFAULT_QUIT_KEYS,
  normalizeAutoRefresh,
  resolveAppConfig,
} from "./app/config.js";
export { createApp } from "./app/createApp.js";
export type {
  App,
  AppConfig,
  AppExit,
  AutoRefreshSetting,
  CallLaterOptions,
  CallbackFn,
  CreateAppOptions,
  EventHandler,
  KeyHandler,
  ResolvedAppConfig,
  ScheduleOptions,
  Scheduler,
  ThreadFactory,
  WorkerBody,
  WorkerContext,
  WorkerOptions,
} from "./app/types.js";

// =============================================================================
// Widgets
// =============================================================================

export { FocusList } from "./widgets/focusList.js";
export { ObjectContainer, type ObjectContainerOptions } from "./widgets/objectContainer.js";
export { type ObjectList, type ObjectListOptions, createObjectList } from "./widgets/objectList.js";
export { type KeyFunction, type SortKey, type SortKeyAtom, compareKeys } from "./widgets/sortKey.js";
export type { WidgetContainer } from "./widgets/widgetContainer.js";

// =============================================================================
// Testing
// =============================================================================

export { ManualLoop, type ManualLoopOptions } from "./testing/manualLoop.js";
