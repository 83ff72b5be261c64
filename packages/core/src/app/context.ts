/**
 * packages/core/src/app/context.ts — Context handed to screens, dialogs,
 * components and their hooks.
 */

import type { Logger } from "../logging/logger.js";
import type { FocusManager } from "../runtime/focus.js";
import type { Navigator } from "../runtime/navigation.js";
import type { DispatchResult, Store } from "../state/store.js";
import type { Theme } from "../theme/types.js";
import type { ResolvedAppConfig } from "./config.js";
import type { Notification, NotifyOptions } from "./notifications.js";

export type UiContext = Readonly<{
  store: Store;
  navigator: Navigator;
  focus: FocusManager;
  theme: Theme;
  logger: Logger;
  config: ResolvedAppConfig;
  /** Shorthand for store.dispatch(). */
  dispatch: (name: string, payload?: unknown) => DispatchResult;
  /** Mark the frame dirty so the next tick renders. */
  requestRedraw: () => void;
  notify: (message: string, opts?: NotifyOptions) => Notification;
  /** Stop the frame loop after the current tick. */
  stop: () => void;
  nowMs: () => number;
}>;
