/**
 * packages/core/src/logging/logger.ts — Leveled runtime logger.
 *
 * Records below the configured level are dropped. Accepted records go to the
 * sink and into a bounded ring of recent records, so tests and debug overlays
 * can inspect what the runtime reported without owning stdout.
 *
 * The default sink reaches `console` through globalThis; while the UI owns the
 * terminal, apps should pass a file sink (see @termloom/node).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogRecord = Readonly<{
  timeMs: number;
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
  detail?: unknown;
}>;

export type LogSink = (record: LogRecord) => void;

export type Logger = Readonly<{
  debug: (message: string, detail?: unknown) => void;
  info: (message: string, detail?: unknown) => void;
  warn: (message: string, detail?: unknown) => void;
  error: (message: string, detail?: unknown) => void;
  /** Logger sharing sink, level and ring with a nested scope name. */
  child: (scope: string) => Logger;
  /** Most recent records, oldest first. */
  records: () => readonly LogRecord[];
  readonly level: LogLevel;
}>;

export type LoggerOptions = Readonly<{
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
  /** Ring capacity for records(). Default 256. */
  maxRecords?: number;
  now?: () => number;
}>;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
});

const DEFAULT_MAX_RECORDS = 256;

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && Object.hasOwn(LEVEL_RANK, v);
}

export function formatLogRecord(record: LogRecord): string {
  const base = `[termloom:${record.scope}] ${record.level}: ${record.message}`;
  if (record.detail === undefined) return base;
  if (record.detail instanceof Error) return `${base} (${record.detail.name}: ${record.detail.message})`;
  return `${base} ${String(record.detail)}`;
}

type ConsoleLike = Partial<Record<LogRecord["level"], (msg: string) => void>>;

export const consoleSink: LogSink = (record) => {
  const c = (globalThis as { console?: ConsoleLike }).console;
  c?.[record.level]?.(formatLogRecord(record));
};

/** Sink that discards everything. */
export const nullSink: LogSink = () => {};

type SharedLoggerState = {
  readonly sink: LogSink;
  readonly rank: number;
  readonly level: LogLevel;
  readonly maxRecords: number;
  readonly now: () => number;
  readonly ring: LogRecord[];
};

function makeLogger(shared: SharedLoggerState, scope: string): Logger {
  function log(level: Exclude<LogLevel, "silent">, message: string, detail: unknown): void {
    if (LEVEL_RANK[level] < shared.rank) return;
    const record: LogRecord = Object.freeze({
      timeMs: shared.now(),
      level,
      scope,
      message,
      ...(detail === undefined ? {} : { detail }),
    });
    shared.ring.push(record);
    if (shared.ring.length > shared.maxRecords) shared.ring.shift();
    try {
      shared.sink(record);
    } catch (e: unknown) {
      if (shared.sink === consoleSink) return;
      const reason = e instanceof Error ? e.message : String(e);
      consoleSink(Object.freeze({ ...record, level: "error", message: `log sink failed (${reason}): ${message}` }));
    }
  }

  return Object.freeze({
    debug: (message: string, detail?: unknown) => log("debug", message, detail),
    info: (message: string, detail?: unknown) => log("info", message, detail),
    warn: (message: string, detail?: unknown) => log("warn", message, detail),
    error: (message: string, detail?: unknown) => log("error", message, detail),
    child: (childScope: string) => makeLogger(shared, `${scope}:${childScope}`),
    records: () => Object.freeze(shared.ring.slice()),
    level: shared.level,
  });
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? "warn";
  const maxRecords =
    opts.maxRecords !== undefined && Number.isInteger(opts.maxRecords) && opts.maxRecords > 0
      ? opts.maxRecords
      : DEFAULT_MAX_RECORDS;
  return makeLogger(
    {
      sink: opts.sink ?? consoleSink,
      rank: LEVEL_RANK[level],
      level,
      maxRecords,
      now: opts.now ?? Date.now,
      ring: [],
    },
    opts.scope ?? "core",
  );
}
