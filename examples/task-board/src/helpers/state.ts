import { type GetState, type Store, invalidProps } from "@termloom/core";
import type { BoardState, Task, TaskFilter } from "../types.js";

export const TASK_TITLE_MAX = 60;

const FILTER_ORDER: readonly TaskFilter[] = Object.freeze(["all", "open", "done"]);

export const BoardActions = Object.freeze({
  add: "tasks.add",
  toggle: "tasks.toggle",
  remove: "tasks.remove",
  clearDone: "tasks.clearDone",
  cycleFilter: "filter.cycle",
});

const SEED_TASKS: readonly Task[] = Object.freeze([
  { id: 1, title: "Sketch the board layout", done: true },
  { id: 2, title: "Wire the new-task dialog", done: false },
  { id: 3, title: "Write the release notes", done: false },
]);

export function createInitialState(tasks: readonly Task[] = SEED_TASKS): BoardState {
  const maxId = tasks.reduce((max, t) => Math.max(max, t.id), 0);
  return Object.freeze({ tasks, nextId: maxId + 1, filter: "all" });
}

function isTask(v: unknown): v is Task {
  return (
    typeof v === "object" &&
    v !== null &&
    "id" in v &&
    typeof v.id === "number" &&
    "title" in v &&
    typeof v.title === "string" &&
    "done" in v &&
    typeof v.done === "boolean"
  );
}

function isTaskFilter(v: unknown): v is TaskFilter {
  return FILTER_ORDER.some((f) => f === v);
}

/** Board slice of the store; malformed entries are left out. */
export function readBoard(getState: GetState): BoardState {
  const tasks = getState("tasks");
  const nextId = getState("nextId");
  const filter = getState("filter");
  return Object.freeze({
    tasks: Array.isArray(tasks) ? tasks.filter(isTask) : [],
    nextId: typeof nextId === "number" && Number.isInteger(nextId) && nextId > 0 ? nextId : 1,
    filter: isTaskFilter(filter) ? filter : "all",
  });
}

export function visibleTasks(board: BoardState): readonly Task[] {
  switch (board.filter) {
    case "open":
      return board.tasks.filter((t) => !t.done);
    case "done":
      return board.tasks.filter((t) => t.done);
    default:
      return board.tasks;
  }
}

export function nextFilter(current: TaskFilter): TaskFilter {
  const index = FILTER_ORDER.indexOf(current);
  return FILTER_ORDER[(index + 1) % FILTER_ORDER.length] ?? "all";
}

function requireTitle(payload: unknown): string {
  const raw =
    typeof payload === "object" && payload !== null && "title" in payload ? payload.title : undefined;
  if (typeof raw !== "string") invalidProps("task title must be a string");
  const title = raw.trim();
  if (title.length === 0) invalidProps("task title must not be empty");
  if ([...title].length > TASK_TITLE_MAX) {
    invalidProps(`task title must be at most ${String(TASK_TITLE_MAX)} characters`);
  }
  return title;
}

function requireTaskId(payload: unknown, tasks: readonly Task[]): number {
  const id = typeof payload === "object" && payload !== null && "id" in payload ? payload.id : undefined;
  if (typeof id !== "number" || !tasks.some((t) => t.id === id)) {
    invalidProps(`no task with id ${String(id)}`);
  }
  return id;
}

export function registerBoardActions(store: Store): void {
  store.registerAction(BoardActions.add, (ctx, payload) => {
    const board = readBoard(ctx.getState);
    const title = requireTitle(payload);
    ctx.updateState({
      tasks: [...board.tasks, { id: board.nextId, title, done: false }],
      nextId: board.nextId + 1,
    });
  });

  store.registerAction(BoardActions.toggle, (ctx, payload) => {
    const { tasks } = readBoard(ctx.getState);
    const id = requireTaskId(payload, tasks);
    ctx.updateState({ tasks: tasks.map((t) => (t.id === id ? { ...t, done: !t.done } : t)) });
  });

  store.registerAction(BoardActions.remove, (ctx, payload) => {
    const { tasks } = readBoard(ctx.getState);
    const id = requireTaskId(payload, tasks);
    ctx.updateState({ tasks: tasks.filter((t) => t.id !== id) });
  });

  store.registerAction(BoardActions.clearDone, (ctx) => {
    const { tasks } = readBoard(ctx.getState);
    ctx.updateState({ tasks: tasks.filter((t) => !t.done) });
  });

  store.registerAction(BoardActions.cycleFilter, (ctx) => {
    ctx.updateState({ filter: nextFilter(readBoard(ctx.getState).filter) });
  });
}
