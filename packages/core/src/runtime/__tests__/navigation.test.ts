import { assert, describe, test } from "@termloom/testkit";
import type { UiContext } from "../../app/context.js";
import { isLoomError } from "../../errors.js";
import { startTestApp } from "../../testing/testApp.js";
import { UiNode } from "../../tree/node.js";
import { Screen } from "../screen.js";

class TrackedScreen extends Screen {
  readonly field: UiNode;

  constructor(
    id: string,
    private readonly events: string[],
    private readonly failInit = false,
  ) {
    super({ id });
    this.field = this.addChild(new UiNode({ id: `${id}-field`, focusable: true }));
  }

  override init(ctx: UiContext): void {
    this.events.push(`${this.id}:init`);
    if (ctx.navigator.currentScreen !== this) this.events.push(`${this.id}:not-current`);
    if (this.failInit) throw new Error("no data");
  }

  override onExit(): void {
    this.events.push(`${this.id}:exit`);
  }

  override onResume(): void {
    this.events.push(`${this.id}:resume`);
  }
}

class TrackedDialog extends UiNode {
  constructor(
    id: string,
    private readonly events: string[],
  ) {
    super({ id });
  }

  override onClose(): void {
    this.events.push(`${this.id}:close`);
  }
}

describe("screen stack", () => {
  test("push exits the current screen and keeps it below", async () => {
    const { app } = await startTestApp();
    const events: string[] = [];
    const home = new TrackedScreen("home", events);
    const detail = new TrackedScreen("detail", events);

    app.navigator.pushScreen(home);
    app.navigator.pushScreen(detail);
    assert.equal(app.navigator.currentScreen, detail);
    assert.equal(app.navigator.depth, 1);
    assert.deepEqual(events, ["home:init", "home:exit", "detail:init"]);
  });

  test("pop resumes the screen below and restores its focus", async () => {
    const { app } = await startTestApp();
    const events: string[] = [];
    const home = new TrackedScreen("home", events);
    app.navigator.pushScreen(home);
    app.focus.setFocus(home.field);
    app.navigator.pushScreen(new TrackedScreen("detail", events));
    assert.equal(app.focus.focusedNode, null);

    assert.equal(app.navigator.popScreen(), true);
    assert.equal(app.navigator.currentScreen, home);
    assert.equal(app.focus.focusedNode, home.field);
    assert.deepEqual(events.slice(-2), ["detail:exit", "home:resume"]);
  });

  test("pop at the bottom of the stack does nothing", async () => {
    const { app } = await startTestApp();
    assert.equal(app.navigator.popScreen(), false);
    app.navigator.pushScreen(new Screen({ id: "only" }));
    assert.equal(app.navigator.popScreen(), false);
    assert.equal(app.navigator.currentScreen?.id, "only");
  });

  test("replace drops the current screen", async () => {
    const { app } = await startTestApp();
    const events: string[] = [];
    const home = new TrackedScreen("home", events);
    app.navigator.pushScreen(home);
    app.navigator.pushScreen(new TrackedScreen("list", events));
    app.navigator.replaceScreen(new TrackedScreen("edit", events));

    assert.equal(app.navigator.depth, 1);
    assert.equal(app.navigator.currentScreen?.id, "edit");
    app.navigator.popScreen();
    assert.equal(app.navigator.currentScreen, home);
  });

  test("a screen cannot be on the stack twice", async () => {
    const { app } = await startTestApp();
    const home = new Screen({ id: "home" });
    app.navigator.pushScreen(home);
    app.navigator.pushScreen(new Screen({ id: "next" }));
    assert.throws(
      () => app.navigator.pushScreen(home),
      (e: unknown) => isLoomError(e, "LOOM_INVALID_STATE"),
    );
  });

  test("a failing init restores the previous screen and its focus", async () => {
    const { app } = await startTestApp();
    const events: string[] = [];
    const home = new TrackedScreen("home", events);
    app.navigator.pushScreen(home);
    app.focus.setFocus(home.field);

    assert.throws(
      () => app.navigator.pushScreen(new TrackedScreen("broken", events, true)),
      (e: unknown) =>
        isLoomError(e, "LOOM_INITIALIZATION") &&
        e.message === 'init of screen "broken" failed: Error: no data',
    );
    assert.equal(app.navigator.currentScreen, home);
    assert.equal(app.navigator.depth, 0);
    assert.equal(app.focus.focusedNode, home.field);
    assert.deepEqual(events, ["home:init", "home:exit", "broken:init", "home:resume"]);
  });

  test("a failing first screen leaves no current screen", async () => {
    const { app } = await startTestApp();
    assert.throws(() => app.navigator.pushScreen(new TrackedScreen("broken", [], true)));
    assert.equal(app.navigator.currentScreen, null);
  });
});

describe("dialogs", () => {
  test("show focuses the dialog and close restores the screen focus", async () => {
    const { app } = await startTestApp();
    const events: string[] = [];
    const home = new TrackedScreen("home", events);
    app.navigator.pushScreen(home);
    app.focus.setFocus(home.field);

    const dialog = new TrackedDialog("confirm", events);
    const yes = dialog.addChild(new UiNode({ focusable: true }));
    app.navigator.showDialog(dialog);
    assert.equal(app.navigator.activeDialog, dialog);
    assert.equal(app.navigator.scopeRoot, dialog);
    assert.equal(app.focus.focusedNode, yes);

    assert.equal(app.navigator.closeDialog(), true);
    assert.equal(app.focus.focusedNode, home.field);
    assert.deepEqual(events.slice(-1), ["confirm:close"]);
    assert.equal(app.navigator.closeDialog(), false);
  });

  test("stacked dialogs restore focus one level at a time", async () => {
    const { app } = await startTestApp();
    app.navigator.pushScreen(new Screen());
    const outer = new UiNode({ id: "outer" });
    const outerField = outer.addChild(new UiNode({ focusable: true }));
    const inner = new UiNode({ id: "inner" });
    inner.addChild(new UiNode({ focusable: true }));

    app.navigator.showDialog(outer);
    app.navigator.showDialog(inner);
    assert.equal(app.navigator.dialogCount, 2);
    app.navigator.closeDialog();
    assert.equal(app.navigator.activeDialog, outer);
    assert.equal(app.focus.focusedNode, outerField);
  });

  test("showing an open dialog again is rejected", async () => {
    const { app } = await startTestApp();
    app.navigator.pushScreen(new Screen());
    const dialog = new UiNode();
    app.navigator.showDialog(dialog);
    assert.throws(
      () => app.navigator.showDialog(dialog),
      (e: unknown) => isLoomError(e, "LOOM_INVALID_STATE"),
    );
  });

  test("screen navigation closes every open dialog", async () => {
    const { app } = await startTestApp();
    const events: string[] = [];
    app.navigator.pushScreen(new TrackedScreen("home", events));
    app.navigator.showDialog(new TrackedDialog("d1", events));
    app.navigator.showDialog(new TrackedDialog("d2", events));

    app.navigator.pushScreen(new TrackedScreen("next", events));
    assert.equal(app.navigator.dialogCount, 0);
    assert.deepEqual(events.slice(1), ["d2:close", "d1:close", "home:exit", "next:init"]);
  });
});
