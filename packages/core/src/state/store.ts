/**
 * packages/core/src/state/store.ts — Reactive key-path store.
 *
 * State is addressed by dot-separated key paths. Mutation only happens inside
 * an action handler through `ctx.updateState`; each write is copy-on-write, so
 * history snapshots are frozen roots that never change afterwards. Objects
 * handed to createStore() or updateState() are copied before freezing.
 *
 * @example
 * ```ts
 * const store = createStore({ counter: 0 });
 * store.registerAction("INCR", (ctx) => {
 *   ctx.updateState({ counter: Number(ctx.getState("counter")) + 1 });
 * });
 * store.subscribe("counter", (prev, next) => render(prev, next));
 * store.dispatch("INCR");
 * ```
 */

import { LoomError, invalidProps, thrownMessage } from "../errors.js";
import { type Logger, createLogger } from "../logging/logger.js";
import { type StateTree, frozenCopy, frozenTree, getAtPath, setAtPath, splitKeyPath } from "./keyPath.js";

export type { StateTree } from "./keyPath.js";

export type SubscriptionHandler = (oldValue: unknown, newValue: unknown, path: string) => void;

export type SubscriptionId = number;

export type GetState = {
  (): StateTree;
  (path: string): unknown;
};

export type DispatchResult =
  | Readonly<{ success: true }>
  | Readonly<{ success: false; error?: string }>;

export type ActionContext = Readonly<{
  getState: GetState;
  /** Keys are top-level names or dot paths. */
  updateState: (partial: Readonly<Record<string, unknown>>) => void;
  dispatch: (name: string, payload?: unknown) => DispatchResult;
}>;

export type ActionHandler = (ctx: ActionContext, payload: unknown) => void;

export type HistoryEntry = Readonly<{
  action: string;
  payload: unknown;
  previousSnapshot: StateTree;
  nextSnapshot: StateTree;
  timestampMs: number;
}>;

export type Store = Readonly<{
  getState: GetState;
  subscribe: (path: string, handler: SubscriptionHandler) => SubscriptionId;
  /** Returns whether a subscription was removed. */
  unsubscribe: (id: SubscriptionId) => boolean;
  registerAction: (name: string, handler: ActionHandler) => void;
  hasAction: (name: string) => boolean;
  dispatch: (name: string, payload?: unknown) => DispatchResult;
  /** Oldest first. */
  getHistory: () => readonly HistoryEntry[];
  clearHistory: () => void;
}>;

export type StoreOptions = Readonly<{
  /** Most recent entries kept. Default 100. */
  historyLimit?: number;
  logger?: Logger;
  now?: () => number;
}>;

export const DEFAULT_HISTORY_LIMIT = 100;

type Subscription = Readonly<{
  id: SubscriptionId;
  path: string;
  handler: SubscriptionHandler;
}>;

export function createStore(initial: StateTree = {}, opts: StoreOptions = {}): Store {
  const historyLimit = opts.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  if (!Number.isInteger(historyLimit) || historyLimit <= 0) {
    invalidProps(`historyLimit must be a positive integer (got ${String(historyLimit)})`);
  }
  const logger = (opts.logger ?? createLogger()).child("store");
  const now = opts.now ?? Date.now;

  let state: StateTree = frozenTree(initial);

  const subscribersByPath = new Map<string, Subscription[]>();
  const pathById = new Map<SubscriptionId, string>();
  const actions = new Map<string, ActionHandler>();
  const history: HistoryEntry[] = [];
  let nextSubscriptionId = 1;

  function getState(): StateTree;
  function getState(path: string): unknown;
  function getState(path?: string): unknown {
    if (path === undefined) return state;
    if (typeof path !== "string" || path.length === 0) return undefined;
    return getAtPath(state, path.split("."));
  }

  function callSubscriber(sub: Subscription, oldValue: unknown, newValue: unknown): void {
    try {
      sub.handler(oldValue, newValue, sub.path);
    } catch (e: unknown) {
      logger.error(`subscriber ${String(sub.id)} on "${sub.path}" threw: ${thrownMessage(e)}`, e);
    }
  }

  function notify(path: string, oldValue: unknown, newValue: unknown): void {
    const subs = subscribersByPath.get(path);
    if (subs === undefined) return;
    // Handlers may unsubscribe while being notified.
    for (const sub of subs.slice()) callSubscriber(sub, oldValue, newValue);
  }

  function subscribe(path: string, handler: SubscriptionHandler): SubscriptionId {
    const normalized = splitKeyPath(path).join(".");
    const sub: Subscription = Object.freeze({ id: nextSubscriptionId++, path: normalized, handler });
    const list = subscribersByPath.get(normalized);
    if (list === undefined) subscribersByPath.set(normalized, [sub]);
    else list.push(sub);
    pathById.set(sub.id, normalized);
    callSubscriber(sub, undefined, getState(normalized));
    return sub.id;
  }

  function unsubscribe(id: SubscriptionId): boolean {
    const path = pathById.get(id);
    if (path === undefined) return false;
    pathById.delete(id);
    const list = subscribersByPath.get(path);
    if (list === undefined) return true;
    const idx = list.findIndex((s) => s.id === id);
    if (idx >= 0) list.splice(idx, 1);
    if (list.length === 0) subscribersByPath.delete(path);
    return true;
  }

  function registerAction(name: string, handler: ActionHandler): void {
    if (typeof name !== "string" || name.length === 0) {
      invalidProps("action name must be a non-empty string");
    }
    if (actions.has(name)) logger.debug(`action "${name}" re-registered`);
    actions.set(name, handler);
  }

  function applyPartial(partial: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(partial)) {
      const segments = splitKeyPath(key);
      const oldValue = getAtPath(state, segments);
      if (oldValue === value) continue;
      const stored = frozenCopy(value);
      state = setAtPath(state, segments, stored);
      notify(segments.join("."), oldValue, stored);
    }
  }

  function pushHistory(entry: HistoryEntry): void {
    history.push(entry);
    if (history.length > historyLimit) history.splice(0, history.length - historyLimit);
  }

  function dispatch(name: string, payload?: unknown): DispatchResult {
    const handler = actions.get(name);
    if (handler === undefined) {
      logger.debug(`dispatch of unknown action "${name}"`);
      return Object.freeze({ success: false, error: `unknown action: ${name}` });
    }

    let active = true;
    const ctx: ActionContext = Object.freeze({
      getState,
      updateState: (partial: Readonly<Record<string, unknown>>) => {
        if (!active) {
          throw new LoomError(
            "LOOM_INVALID_STATE",
            `updateState called after action "${name}" returned`,
          );
        }
        applyPartial(partial);
      },
      dispatch,
    });

    const previousSnapshot = state;
    try {
      handler(ctx, payload);
    } catch (e: unknown) {
      const message = thrownMessage(e);
      const err = new LoomError("LOOM_DISPATCH", `action "${name}" failed: ${message}`, {
        cause: e,
      });
      logger.error(err.message, err);
      return Object.freeze({ success: false, error: message });
    } finally {
      active = false;
    }

    pushHistory(
      Object.freeze({
        action: name,
        payload,
        previousSnapshot,
        nextSnapshot: state,
        timestampMs: now(),
      }),
    );
    return Object.freeze({ success: true });
  }

  return Object.freeze({
    getState,
    subscribe,
    unsubscribe,
    registerAction,
    hasAction: (name: string) => actions.has(name),
    dispatch,
    getHistory: () => Object.freeze(history.slice()),
    clearHistory: () => {
      history.length = 0;
    },
  });
}
