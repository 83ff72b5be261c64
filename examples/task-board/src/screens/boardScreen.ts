/**
 * Task list with a header, a bordered list and a key-hint footer.
 *
 * The list mirrors the store: the screen subscribes to the board keys while
 * it is current and re-reads them on every change.
 */

import {
  Box,
  ListView,
  type PaintContext,
  Screen,
  type Size,
  type SubscriptionId,
  type UiContext,
  type KeyEvent,
} from "@termloom/core";
import { NewTaskDialog } from "../dialogs/newTaskDialog.js";
import { resolveBoardCommand } from "../helpers/keybindings.js";
import { BoardActions, createInitialState, readBoard, visibleTasks } from "../helpers/state.js";
import type { BoardState, Task } from "../types.js";
import { HelpScreen } from "./helpScreen.js";

const WATCHED_PATHS: readonly string[] = Object.freeze(["tasks", "filter"]);
const FOOTER_HINT = "n new  space toggle  d delete  f filter  ? help";

export function formatTask(task: Task): string {
  return `${task.done ? "[x]" : "[ ]"} ${task.title}`;
}

export class BoardScreen extends Screen {
  private board: BoardState = createInitialState([]);
  private subscriptions: SubscriptionId[] = [];
  readonly box: Box;
  readonly list: ListView<Task>;

  constructor() {
    super({ id: "board", title: "Task Board" });
    this.box = this.addChild(new Box({ id: "board-box", title: "Tasks", stretch: true }));
    this.list = this.box.addChild(
      new ListView<Task>({
        id: "task-list",
        format: formatTask,
        emptyText: "No tasks. Press n to add one.",
        onSelect: (task, _index, ctx) => {
          this.toggle(ctx, task);
        },
      }),
    );
  }

  override init(ctx: UiContext): void {
    this.watch(ctx);
    ctx.focus.setFocus(this.list);
  }

  override onExit(ctx: UiContext): void {
    for (const id of this.subscriptions) ctx.store.unsubscribe(id);
    this.subscriptions = [];
  }

  override onResume(ctx: UiContext): void {
    this.watch(ctx);
  }

  override layout(viewport: Size): void {
    this.box.setBounds({ x: 0, y: 1, w: viewport.w, h: Math.max(0, viewport.h - 2) });
    this.list.height = this.box.contentRect.h;
  }

  override renderChrome(ctx: PaintContext): void {
    const header = { fg: "bg", bg: "primary" } as const;
    ctx.fill({ x: 0, y: 0, w: this.width, h: 1 }, header);
    ctx.drawText(1, 0, this.title, header);
    const done = this.board.tasks.filter((t) => t.done).length;
    const summary = `${String(done)}/${String(this.board.tasks.length)} done  filter: ${this.board.filter}`;
    ctx.drawText(Math.max(0, this.width - summary.length - 1), 0, summary, header);
    ctx.drawText(1, this.height - 1, FOOTER_HINT, { fg: "muted" });
  }

  override handleInput(ctx: UiContext, key: KeyEvent): boolean {
    // Board commands stay quiet under a dialog; it owns the keyboard.
    if (ctx.navigator.activeDialog !== null) return false;
    const command = resolveBoardCommand(key);
    if (command === undefined) return false;
    const selected = this.list.selectedItem;
    switch (command) {
      case "new-task":
        ctx.navigator.showDialog(new NewTaskDialog());
        return true;
      case "toggle-task":
        if (selected !== undefined) this.toggle(ctx, selected);
        return true;
      case "remove-task":
        if (selected !== undefined) this.run(ctx, BoardActions.remove, { id: selected.id });
        return true;
      case "clear-done":
        this.run(ctx, BoardActions.clearDone);
        return true;
      case "cycle-filter":
        this.run(ctx, BoardActions.cycleFilter);
        return true;
      case "show-help":
        ctx.navigator.pushScreen(new HelpScreen());
        return true;
    }
  }

  private toggle(ctx: UiContext, task: Task): void {
    this.run(ctx, BoardActions.toggle, { id: task.id });
  }

  private run(ctx: UiContext, action: string, payload?: unknown): void {
    const result = ctx.dispatch(action, payload);
    if (!result.success) ctx.notify(result.error ?? `${action} failed`, { level: "error" });
  }

  private watch(ctx: UiContext): void {
    this.subscriptions = WATCHED_PATHS.map((path) =>
      ctx.store.subscribe(path, () => {
        this.refresh(ctx);
      }),
    );
  }

  private refresh(ctx: UiContext): void {
    this.board = readBoard(ctx.store.getState);
    this.list.setItems(visibleTasks(this.board));
    ctx.requestRedraw();
  }
}
