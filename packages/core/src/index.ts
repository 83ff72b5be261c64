/**
 * @termloom/core
 *
 * Backend-agnostic terminal UI runtime: retained node tree, stack and grid
 * layout, double-buffered diff renderer, key-path store, focus and
 * screen/dialog navigation, and the frame loop.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors & logging
// =============================================================================

export {
  LoomError,
  describeThrown,
  invalidProps,
  isLoomError,
  isRecoverableError,
  thrownMessage,
  toError,
} from "./errors.js";
export type { LoomErrorCode } from "./errors.js";

export { consoleSink, createLogger, formatLogRecord, isLogLevel, nullSink } from "./logging/logger.js";
export type { LogLevel, LogRecord, LogSink, Logger, LoggerOptions } from "./logging/logger.js";

// =============================================================================
// App & backend
// =============================================================================

export { createApp } from "./app/createApp.js";
export type { App, AppOptions, TickResult } from "./app/createApp.js";
export { resolveAppConfig } from "./app/config.js";
export type { AppConfig, ResolvedAppConfig } from "./app/config.js";
export type { UiContext } from "./app/context.js";
export { computeFrameInterval, computeSleepMs } from "./app/frameTiming.js";
export { NotificationCenter } from "./app/notifications.js";
export type {
  Notification,
  NotificationLevel,
  NotifyOptions,
} from "./app/notifications.js";
export type { AppState } from "./app/stateMachine.js";
export type { TerminalBackend, TerminalSize, Unsubscribe } from "./backend.js";

// =============================================================================
// Input
// =============================================================================

export { decodeKeys, keyEvent, printableText, splitIncompleteEscape } from "./input/keys.js";
export type { KeyEvent, KeyModifiers } from "./input/keys.js";
export { keyToString, matchesKey, parseKeyBinding, requireKeyBinding } from "./input/keyBinding.js";
export type { KeyBinding, KeyBindingErrorCode, ParseKeyBindingResult } from "./input/keyBinding.js";
export { DEFAULT_INPUT_QUEUE_CAPACITY, InputQueue } from "./input/inputQueue.js";

// =============================================================================
// Tree & layout
// =============================================================================

export { UiNode } from "./tree/node.js";
export type { NodeProps } from "./tree/node.js";
export {
  collectEffectivelyVisible,
  isEffectivelyVisible,
  walkAll,
  walkEffectivelyVisible,
} from "./tree/traversal.js";
export { hide, setVisible, show } from "./tree/visibility.js";
export { Panel } from "./layout/panel.js";
export type { PanelProps } from "./layout/panel.js";
export { StackPanel } from "./layout/stackPanel.js";
export type { StackPanelProps } from "./layout/stackPanel.js";
export { GridPanel } from "./layout/gridPanel.js";
export type { GridPanelProps, GridPlacement } from "./layout/gridPanel.js";
export { fixed, resolveTrackSizes, weighted } from "./layout/tracks.js";
export type { Track } from "./layout/tracks.js";
export { intersectRects, rectContains, resolveInsets } from "./layout/types.js";
export type { Insets, InsetsInput, Orientation, Rect, Size } from "./layout/types.js";
export { measureTextCells, splitGraphemes, truncateWithEllipsis } from "./layout/textMeasure.js";

// =============================================================================
// Rendering & theme
// =============================================================================

export { FrameBuffer } from "./renderer/frameBuffer.js";
export { diffFrame } from "./renderer/diff.js";
export { PaintContext } from "./renderer/paint.js";
export type { BorderStyle, PaintColor, PaintStyle } from "./renderer/paint.js";
export { Renderer, collectRenderQueue } from "./renderer/renderFrame.js";
export type { FrameStats, Scene } from "./renderer/renderFrame.js";
export type { Cell } from "./renderer/cell.js";
export { TERMINAL_RESTORE, TERMINAL_SETUP } from "./terminal/ansi.js";
export { parseHexColor, rgb } from "./theme/color.js";
export type { Rgb24 } from "./theme/color.js";
export { defaultTheme } from "./theme/defaultTheme.js";
export { createTheme, resolveColor } from "./theme/theme.js";
export type { Theme, ThemeColorName, ThemeColors } from "./theme/types.js";

// =============================================================================
// State, focus, navigation
// =============================================================================

export { createStore } from "./state/store.js";
export type {
  ActionContext,
  ActionHandler,
  DispatchResult,
  GetState,
  HistoryEntry,
  StateTree,
  Store,
  StoreOptions,
  SubscriptionHandler,
  SubscriptionId,
} from "./state/store.js";
export { FocusManager, computeTabOrder } from "./runtime/focus.js";
export { Navigator } from "./runtime/navigation.js";
export { Screen } from "./runtime/screen.js";
export type { ScreenProps } from "./runtime/screen.js";

// =============================================================================
// Widgets
// =============================================================================

export { Box } from "./widgets/box.js";
export type { BoxProps } from "./widgets/box.js";
export { Button } from "./widgets/button.js";
export type { ButtonProps } from "./widgets/button.js";
export { DialogFrame } from "./widgets/dialogFrame.js";
export type { DialogFrameProps } from "./widgets/dialogFrame.js";
export { Label } from "./widgets/label.js";
export type { LabelProps, TextAlign } from "./widgets/label.js";
export { ListView } from "./widgets/listView.js";
export type { ListViewProps } from "./widgets/listView.js";
export { TextInput } from "./widgets/textInput.js";
export type { TextInputProps } from "./widgets/textInput.js";
