/**
 * packages/core/src/app/config.ts — App configuration defaults and guards.
 */

import { invalidProps } from "../errors.js";
import { DEFAULT_INPUT_QUEUE_CAPACITY } from "../input/inputQueue.js";
import { type KeyBinding, requireKeyBinding } from "../input/keyBinding.js";
import { DEFAULT_HISTORY_LIMIT } from "../state/store.js";

export type AppConfig = Readonly<{
  /** Frame rate ceiling. Default 30. */
  fpsCap?: number;
  /** Input events buffered between ticks. Default 100. */
  inputQueueCapacity?: number;
  /** Store history entries kept. Default 100. */
  historyLimit?: number;
  /** Bindings that stop the app before any handler sees them. Default ["ctrl+c"]. */
  exitKeys?: readonly string[];
  /** Toast lifetime. Default 3000. */
  notificationTtlMs?: number;
  /** Wrap frames in synchronized-update markers. Default true. */
  synchronizedOutput?: boolean;
}>;

export type ResolvedAppConfig = Readonly<{
  fpsCap: number;
  inputQueueCapacity: number;
  historyLimit: number;
  exitKeys: readonly string[];
  exitBindings: readonly KeyBinding[];
  notificationTtlMs: number;
  synchronizedOutput: boolean;
}>;

const DEFAULT_EXIT_KEYS: readonly string[] = Object.freeze(["ctrl+c"]);

const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  fpsCap: 30,
  inputQueueCapacity: DEFAULT_INPUT_QUEUE_CAPACITY,
  historyLimit: DEFAULT_HISTORY_LIMIT,
  exitKeys: DEFAULT_EXIT_KEYS,
  exitBindings: Object.freeze(DEFAULT_EXIT_KEYS.map(requireKeyBinding)),
  notificationTtlMs: 3000,
  synchronizedOutput: true,
});

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function requireKeyList(name: string, v: readonly string[]): readonly string[] {
  if (!Array.isArray(v)) invalidProps(`${name} must be an array of key binding strings`);
  for (const entry of v) {
    if (typeof entry !== "string") invalidProps(`${name} must be an array of key binding strings`);
  }
  return Object.freeze(v.slice());
}

export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  const fpsCap =
    config.fpsCap === undefined ? DEFAULT_CONFIG.fpsCap : requirePositiveInt("fpsCap", config.fpsCap);
  const inputQueueCapacity =
    config.inputQueueCapacity === undefined
      ? DEFAULT_CONFIG.inputQueueCapacity
      : requirePositiveInt("inputQueueCapacity", config.inputQueueCapacity);
  const historyLimit =
    config.historyLimit === undefined
      ? DEFAULT_CONFIG.historyLimit
      : requirePositiveInt("historyLimit", config.historyLimit);
  const exitKeys =
    config.exitKeys === undefined ? DEFAULT_CONFIG.exitKeys : requireKeyList("exitKeys", config.exitKeys);
  const notificationTtlMs =
    config.notificationTtlMs === undefined
      ? DEFAULT_CONFIG.notificationTtlMs
      : requirePositiveInt("notificationTtlMs", config.notificationTtlMs);
  const synchronizedOutput = config.synchronizedOutput !== false;

  return Object.freeze({
    fpsCap,
    inputQueueCapacity,
    historyLimit,
    exitKeys,
    exitBindings: Object.freeze(exitKeys.map(requireKeyBinding)),
    notificationTtlMs,
    synchronizedOutput,
  });
}
