/**
 * packages/node/src/config/envConfig.ts — Settings read from the environment.
 *
 *   LOOM_FPS        frame rate cap (positive integer)
 *   LOOM_LOG_LEVEL  debug | info | warn | error | silent
 *   LOOM_LOG_FILE   append log records to this file
 *
 * Unset, blank or malformed values are treated as absent.
 */

import { type LogLevel, isLogLevel } from "@termloom/core";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export type EnvConfig = Readonly<{
  fpsCap?: number;
  logLevel?: LogLevel;
  logFile?: string;
}>;

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: EnvMap, key: string): number | undefined {
  const raw = envText(env, key);
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return undefined;
  return value;
}

export function readEnvConfig(env: EnvMap = process.env): EnvConfig {
  const fpsCap = envInt(env, "LOOM_FPS");
  const level = envText(env, "LOOM_LOG_LEVEL")?.toLowerCase();
  const logFile = envText(env, "LOOM_LOG_FILE");
  return Object.freeze({
    ...(fpsCap === undefined ? {} : { fpsCap }),
    ...(isLogLevel(level) ? { logLevel: level } : {}),
    ...(logFile === undefined ? {} : { logFile }),
  });
}
