import { type KeyEvent, keyToString } from "@termloom/core";

export type BoardCommand =
  | "new-task"
  | "toggle-task"
  | "remove-task"
  | "clear-done"
  | "cycle-filter"
  | "show-help";

const COMMAND_BY_KEY: Readonly<Record<string, BoardCommand>> = Object.freeze({
  n: "new-task",
  space: "toggle-task",
  x: "toggle-task",
  d: "remove-task",
  delete: "remove-task",
  c: "clear-done",
  f: "cycle-filter",
  "?": "show-help",
  f1: "show-help",
});

export const HELP_LINES: readonly string[] = Object.freeze([
  "n          new task",
  "space, x   toggle done",
  "enter      toggle done",
  "d, delete  remove task",
  "c          clear done tasks",
  "f          cycle filter",
  "?, f1      this help",
  "ctrl+c     quit",
]);

export function resolveBoardCommand(key: KeyEvent): BoardCommand | undefined {
  return COMMAND_BY_KEY[keyToString(key)];
}
