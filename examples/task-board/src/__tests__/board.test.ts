import { startTestApp } from "@termloom/core/testing";
import { assert, describe, test } from "@termloom/testkit";
import { NewTaskDialog } from "../dialogs/newTaskDialog.js";
import { BoardActions, createInitialState, readBoard, registerBoardActions } from "../helpers/state.js";
import { BoardScreen } from "../screens/boardScreen.js";
import { HelpScreen } from "../screens/helpScreen.js";

async function startBoard() {
  const t = await startTestApp({ cols: 50, rows: 8, initialState: createInitialState() });
  registerBoardActions(t.app.store);
  const board = new BoardScreen();
  t.app.navigator.pushScreen(board);
  t.app.tick(0);
  const type = (data: string): void => {
    t.backend.send(data);
    t.app.tick(0);
  };
  return { ...t, board, type };
}

function row(text: string): string {
  return `│${text.padEnd(48)}│`;
}

describe("BoardScreen", () => {
  test("renders the header, the task list and the key hints", async () => {
    const { screen } = await startBoard();
    const lines = screen().lines();
    assert.equal(lines[0], ` Task Board${" ".repeat(17)}1/3 done  filter: all`);
    assert.equal(lines[1], `┌─ Tasks ${"─".repeat(40)}┐`);
    assert.equal(lines[2], row("[x] Sketch the board layout"));
    assert.equal(lines[3], row("[ ] Wire the new-task dialog"));
    assert.equal(lines[5], row(""));
    assert.equal(lines[6], `└${"─".repeat(48)}┘`);
    assert.equal(lines[7], " n new  space toggle  d delete  f filter  ? help");
  });

  test("space and enter toggle the selected task", async () => {
    const { app, type } = await startBoard();
    type(" ");
    assert.equal(readBoard(app.store.getState).tasks[0]?.done, false);
    type("\x1b[B\r");
    assert.equal(readBoard(app.store.getState).tasks[1]?.done, true);
  });

  test("the list follows the filter", async () => {
    const { board, type, screen } = await startBoard();
    type("f");
    assert.deepEqual(
      board.list.items.map((t) => t.id),
      [2, 3],
    );
    assert.equal(screen().lines()[2], row("[ ] Wire the new-task dialog"));
    type("f");
    assert.deepEqual(
      board.list.items.map((t) => t.id),
      [1],
    );
  });

  test("d removes the selected task", async () => {
    const { app, board, type } = await startBoard();
    type("\x1b[Bd");
    assert.deepEqual(
      readBoard(app.store.getState).tasks.map((t) => t.id),
      [1, 3],
    );
    assert.equal(board.list.selectedItem?.id, 3);
  });

  test("the new-task dialog adds a task, closes and reports it", async () => {
    const { app, board, type } = await startBoard();
    type("n");
    const dialog = app.navigator.activeDialog;
    assert.ok(dialog instanceof NewTaskDialog);
    assert.equal(app.focus.focusedNode, dialog.input);

    type("Buy milk\r");
    const tasks = readBoard(app.store.getState).tasks;
    assert.deepEqual(tasks[3], { id: 4, title: "Buy milk", done: false });
    assert.equal(app.navigator.activeDialog, null);
    assert.equal(app.focus.focusedNode, board.list);
    assert.equal(app.notifications[0]?.message, 'Added "Buy milk"');
    assert.equal(app.notifications[0]?.level, "success");
  });

  test("an empty title keeps the dialog open with an error toast", async () => {
    const { app, type } = await startBoard();
    type("n");
    type("\r");
    assert.ok(app.navigator.activeDialog instanceof NewTaskDialog);
    assert.equal(app.notifications[0]?.message, "task title must not be empty");
    assert.equal(app.notifications[0]?.level, "error");
  });

  test("escape and cancel close the dialog without adding", async () => {
    const { app, type } = await startBoard();
    type("n");
    type("abc\x1b");
    assert.equal(app.navigator.activeDialog, null);
    type("n");
    type("\t\t\r");
    assert.equal(app.navigator.activeDialog, null);
    assert.equal(readBoard(app.store.getState).tasks.length, 3);
  });

  test("board commands do nothing while the dialog has a button focused", async () => {
    const { app, type } = await startBoard();
    type("n");
    type("\t");
    assert.equal(app.focus.focusedNode?.id, "new-task-add");
    type("d");
    assert.ok(app.navigator.activeDialog instanceof NewTaskDialog);
    assert.equal(readBoard(app.store.getState).tasks.length, 3);
  });

  test("help covers the board, which catches up on resume", async () => {
    const { app, board, type } = await startBoard();
    type("?");
    assert.ok(app.navigator.currentScreen instanceof HelpScreen);

    app.context.dispatch(BoardActions.cycleFilter);
    assert.equal(board.list.items.length, 3);

    type("q");
    assert.equal(app.navigator.currentScreen, board);
    assert.equal(board.list.items.length, 2);
  });
});
