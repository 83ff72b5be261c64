/**
 * packages/node/src/logging/fileLogSink.ts — Log sink appending to a file.
 *
 * stdout belongs to the UI while the app runs, so runtime logs go here.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { type LogRecord, type LogSink, formatLogRecord } from "@termloom/core";

/** One line per record: ISO timestamp, then the formatted record. */
export function formatLogLine(record: LogRecord): string {
  return `${new Date(record.timeMs).toISOString()} ${formatLogRecord(record)}\n`;
}

export function createFileLogSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  return (record) => {
    appendFileSync(path, formatLogLine(record), "utf8");
  };
}
