/**
 * packages/core/src/app/createApp.ts — Application runtime and frame loop.
 *
 * The backend's input path decodes keys and pushes them into a bounded queue;
 * the frame loop is the only code touching engine state. Each tick:
 *   1. validate focus, then drain the queue in FIFO order: exit bindings stop
 *      the app; else the active dialog, the focused node, then the current
 *      screen get the key (the first returning true wins; the screen still
 *      sees keys an open dialog leaves alone); unhandled
 *      Tab/Shift+Tab moves focus
 *   2. housekeeping: expire notifications
 *   3. render when input was processed or the frame is dirty
 * run() then sleeps for the rest of the frame interval (at least 1ms).
 *
 * Recoverable errors (component render, screen init) force a full redraw and
 * keep the loop going; anything else is fatal: reported, then the loop stops.
 * The backend is always stopped on the way out.
 */

import type { TerminalBackend, TerminalSize, Unsubscribe } from "../backend.js";
import { LoomError, describeThrown, isLoomError, isRecoverableError } from "../errors.js";
import { InputQueue } from "../input/inputQueue.js";
import { matchesKey } from "../input/keyBinding.js";
import type { KeyEvent } from "../input/keys.js";
import { type Logger, createLogger } from "../logging/logger.js";
import { FrameBuffer } from "../renderer/frameBuffer.js";
import { type FrameStats, Renderer } from "../renderer/renderFrame.js";
import { FocusManager } from "../runtime/focus.js";
import { Navigator } from "../runtime/navigation.js";
import type { Screen } from "../runtime/screen.js";
import { type StateTree, type Store, createStore } from "../state/store.js";
import { defaultTheme } from "../theme/defaultTheme.js";
import type { Theme } from "../theme/types.js";
import { ToastLayer } from "../widgets/toastLayer.js";
import { type AppConfig, type ResolvedAppConfig, resolveAppConfig } from "./config.js";
import type { UiContext } from "./context.js";
import { computeFrameInterval, computeSleepMs } from "./frameTiming.js";
import { type Notification, NotificationCenter, type NotifyOptions } from "./notifications.js";
import { type AppState, AppStateMachine } from "./stateMachine.js";

export type AppOptions = Readonly<{
  backend: TerminalBackend;
  /** Existing store; when absent one is created from initialState. */
  store?: Store;
  initialState?: StateTree;
  theme?: Theme;
  config?: AppConfig;
  logger?: Logger;
  /** Receives the error that stopped the loop. */
  onFatal?: (error: LoomError) => void;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}>;

export type TickResult = Readonly<{
  /** Input events handled this tick. */
  processed: number;
  frame: FrameStats | null;
  running: boolean;
}>;

export type App = Readonly<{
  context: UiContext;
  store: Store;
  navigator: Navigator;
  focus: FocusManager;
  logger: Logger;
  config: ResolvedAppConfig;
  readonly state: AppState;
  /** Input events rejected because the queue was full. */
  readonly droppedInput: number;
  readonly notifications: readonly Notification[];
  /** Start the backend and begin accepting input. */
  start: () => Promise<void>;
  /** Start (when needed), push `screen`, loop until stopped, then close. */
  run: (screen?: Screen) => Promise<void>;
  /** One frame-loop tick; `nowMs` defaults to the app clock. */
  tick: (nowMs?: number) => TickResult;
  /** Ask the loop to exit after the current tick. */
  stop: () => void;
  /** Detach from and stop the backend. Idempotent. */
  close: () => Promise<void>;
  requestRedraw: () => void;
  notify: (message: string, opts?: NotifyOptions) => Notification;
}>;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function createApp(opts: AppOptions): App {
  const config = resolveAppConfig(opts.config);
  const backend = opts.backend;
  const now = opts.now ?? Date.now;
  const sleep = opts.sleep ?? defaultSleep;
  const rootLogger = opts.logger ?? createLogger();
  const logger = rootLogger.child("app");
  const theme = opts.theme ?? defaultTheme;
  const store =
    opts.store ??
    createStore(opts.initialState ?? {}, { historyLimit: config.historyLimit, logger: rootLogger, now });

  const sm = new AppStateMachine();
  const queue = new InputQueue<KeyEvent>(config.inputQueueCapacity);
  const notifications = new NotificationCenter({ ttlMs: config.notificationTtlMs });
  const toasts = new ToastLayer(notifications);
  const initialSize = backend.size();
  const buffer = new FrameBuffer(initialSize.cols, initialSize.rows);
  const renderer = new Renderer({
    buffer,
    theme,
    logger: rootLogger.child("render"),
    synchronizedOutput: config.synchronizedOutput,
  });
  const frameIntervalMs = computeFrameInterval(config.fpsCap);

  let dirty = true;
  let pendingResize: TerminalSize | null = null;
  let fatalError: LoomError | null = null;
  let detach: Unsubscribe[] = [];

  function requestRedraw(): void {
    dirty = true;
  }

  const focus: FocusManager = new FocusManager({
    scopeRoot: () => navigator.scopeRoot,
    context: () => context,
    onChange: requestRedraw,
  });
  const navigator: Navigator = new Navigator({
    focus,
    context: () => context,
    requestRedraw,
    logger: rootLogger,
  });

  function notify(message: string, notifyOpts?: NotifyOptions): Notification {
    const n = notifications.notify(message, now(), notifyOpts);
    requestRedraw();
    return n;
  }

  function stop(): void {
    if (sm.state === "Running") sm.toStopped();
  }

  const context: UiContext = Object.freeze({
    store,
    navigator,
    focus,
    theme,
    logger,
    config,
    dispatch: (name: string, payload?: unknown) => store.dispatch(name, payload),
    requestRedraw,
    notify,
    stop,
    nowMs: () => now(),
  });

  function doFatal(e: unknown): void {
    const err =
      isLoomError(e) && e.code !== "LOOM_COMPONENT_RENDER" && e.code !== "LOOM_INITIALIZATION"
        ? e
        : new LoomError("LOOM_FATAL", describeThrown(e), { cause: e });
    fatalError = err;
    logger.error(`fatal: ${err.message}`, err);
    sm.toFaulted();
    try {
      opts.onFatal?.(err);
    } catch (hookError: unknown) {
      logger.error(`onFatal threw: ${describeThrown(hookError)}`, hookError);
    }
  }

  /** Run one unit of loop work under the error policy. */
  function guard(fn: () => void): void {
    try {
      fn();
    } catch (e: unknown) {
      if (isRecoverableError(e)) {
        logger.warn(`recovered: ${describeThrown(e)}`, e);
        buffer.invalidate();
        requestRedraw();
        return;
      }
      doFatal(e);
    }
  }

  function routeKey(key: KeyEvent): void {
    if (config.exitBindings.some((b) => matchesKey(key, b))) {
      logger.debug("exit key pressed");
      stop();
      return;
    }
    const dialog = navigator.activeDialog;
    if (dialog !== null && dialog.handleInput(context, key)) return;
    const focused = focus.focusedNode;
    if (focused !== null && focused !== dialog && focused.handleInput(context, key)) return;
    const screen = navigator.currentScreen;
    if (screen !== null && screen.handleInput(context, key)) return;
    if (key.name === "tab" && !key.ctrl && !key.alt) focus.tabNavigate(key.shift);
  }

  function renderNow(): FrameStats {
    const stats = renderer.renderFrame({
      screen: navigator.currentScreen,
      dialog: navigator.activeDialog,
      overlay: notifications.active.length > 0 ? toasts : null,
    });
    dirty = false;
    if (stats.output.length > 0) {
      try {
        backend.write(stats.output);
      } catch (e: unknown) {
        throw new LoomError("LOOM_BACKEND_ERROR", `write failed: ${describeThrown(e)}`, {
          cause: e,
        });
      }
    }
    return stats;
  }

  function tick(nowMs: number = now()): TickResult {
    sm.assertOneOf(["Running", "Stopped", "Faulted"], "tick: app was never started");
    if (sm.state !== "Running") return Object.freeze({ processed: 0, frame: null, running: false });

    if (pendingResize !== null) {
      const size = pendingResize;
      pendingResize = null;
      buffer.resize(size.cols, size.rows);
      requestRedraw();
    }

    guard(() => {
      focus.validate();
    });

    let processed = 0;
    for (const key of queue.drain()) {
      if (sm.state !== "Running") break;
      processed++;
      guard(() => routeKey(key));
    }

    if (notifications.expire(nowMs) > 0) requestRedraw();

    let frame: FrameStats | null = null;
    if (sm.state === "Running" && (processed > 0 || dirty)) {
      guard(() => {
        frame = renderNow();
      });
    }
    return Object.freeze({ processed, frame, running: sm.state === "Running" });
  }

  async function start(): Promise<void> {
    sm.assertOneOf(["Created", "Stopped"], "start: must be Created or Stopped");
    try {
      await backend.start();
    } catch (e: unknown) {
      throw new LoomError("LOOM_BACKEND_ERROR", `backend start failed: ${describeThrown(e)}`, {
        cause: e,
      });
    }
    detach = [
      backend.onInput((key) => {
        if (!queue.push(key)) logger.debug(`input queue full, dropped "${key.name}"`);
      }),
      backend.onResize((size) => {
        pendingResize = size;
      }),
    ];
    const size = backend.size();
    buffer.resize(size.cols, size.rows);
    fatalError = null;
    sm.toRunning();
    requestRedraw();
    logger.info(`started ${String(size.cols)}x${String(size.rows)} @ ${String(config.fpsCap)}fps`);
  }

  async function close(): Promise<void> {
    if (sm.state === "Running") sm.toStopped();
    const handlers = detach;
    detach = [];
    for (const off of handlers) off();
    queue.clear();
    try {
      await backend.stop();
    } catch (e: unknown) {
      logger.error(`backend stop failed: ${describeThrown(e)}`, e);
    }
  }

  async function run(screen?: Screen): Promise<void> {
    if (sm.state !== "Running") await start();
    try {
      if (screen !== undefined) {
        try {
          navigator.pushScreen(screen);
        } catch (e: unknown) {
          doFatal(e);
        }
      }
      while (sm.state === "Running") {
        const startedAt = now();
        tick(startedAt);
        if (sm.state !== "Running") break;
        await sleep(computeSleepMs(frameIntervalMs, now() - startedAt));
      }
    } finally {
      await close();
    }
    if (fatalError !== null) throw fatalError;
  }

  return Object.freeze({
    context,
    store,
    navigator,
    focus,
    logger,
    config,
    get state() {
      return sm.state;
    },
    get droppedInput() {
      return queue.dropped;
    },
    get notifications() {
      return notifications.active;
    },
    start,
    run,
    tick,
    stop,
    close,
    requestRedraw,
    notify,
  });
}
