import { assert, describe, test } from "@termloom/testkit";
import { keyEvent } from "../../input/keys.js";
import { startTestApp } from "../../testing/testApp.js";
import { UiNode } from "../../tree/node.js";
import { hide } from "../../tree/visibility.js";
import { computeMovedFocus, computeTabOrder } from "../focus.js";
import { Screen } from "../screen.js";

class Field extends UiNode {
  readonly events: string[] = [];

  constructor(id: string, x: number, y: number) {
    super({ id, x, y, width: 2, height: 1, focusable: true });
  }

  override onFocus(): void {
    this.events.push("focus");
  }

  override onBlur(): void {
    this.events.push("blur");
  }
}

/** Fields added in tree order a, b, c; row-major order is b, a, c. */
function fieldScreen(): { screen: Screen; a: Field; b: Field; c: Field } {
  const screen = new Screen({ id: "fields" });
  const a = screen.addChild(new Field("a", 0, 1));
  const b = screen.addChild(new Field("b", 5, 0));
  const c = screen.addChild(new Field("c", 0, 2));
  screen.addChild(new UiNode({ id: "static", x: 0, y: 0 }));
  return { screen, a, b, c };
}

const TAB = keyEvent("tab");
const SHIFT_TAB = keyEvent("tab", { shift: true });

describe("computeMovedFocus", () => {
  test("empty list has no target", () => {
    assert.equal(computeMovedFocus([], null, "next"), null);
  });

  test("unfocused or unknown starts at an end", () => {
    assert.equal(computeMovedFocus(["x", "y", "z"], null, "next"), "x");
    assert.equal(computeMovedFocus(["x", "y", "z"], null, "prev"), "z");
    assert.equal(computeMovedFocus(["x", "y", "z"], "q", "next"), "x");
  });

  test("wraps in both directions", () => {
    assert.equal(computeMovedFocus(["x", "y", "z"], "z", "next"), "x");
    assert.equal(computeMovedFocus(["x", "y", "z"], "x", "prev"), "z");
  });
});

describe("computeTabOrder", () => {
  test("sorts by row then column and skips non-focusable nodes", () => {
    const { screen } = fieldScreen();
    assert.deepEqual(
      computeTabOrder(screen).map((n) => n.id),
      ["b", "a", "c"],
    );
  });

  test("hidden subtrees and hidden roots contribute nothing", () => {
    const { screen, a } = fieldScreen();
    a.visible = false;
    assert.deepEqual(
      computeTabOrder(screen).map((n) => n.id),
      ["b", "c"],
    );
    screen.visible = false;
    assert.deepEqual(computeTabOrder(screen), []);
    assert.deepEqual(computeTabOrder(null), []);
  });
});

describe("FocusManager through the frame loop", () => {
  test("Tab walks row-major order and wraps", async () => {
    const { app, backend } = await startTestApp();
    const { screen } = fieldScreen();
    app.navigator.pushScreen(screen);
    app.tick(0);

    const seen: (string | null)[] = [];
    for (let i = 0; i < 4; i++) {
      backend.pressKey(TAB);
      app.tick(0);
      seen.push(app.focus.focusedNode?.id ?? null);
    }
    assert.deepEqual(seen, ["b", "a", "c", "b"]);
  });

  test("Shift+Tab starts from the last candidate", async () => {
    const { app, backend } = await startTestApp();
    app.navigator.pushScreen(fieldScreen().screen);
    backend.pressKey(SHIFT_TAB);
    app.tick(0);
    assert.equal(app.focus.focusedNode?.id, "c");
    backend.pressKey(SHIFT_TAB);
    app.tick(0);
    assert.equal(app.focus.focusedNode?.id, "a");
  });

  test("focus hooks and flags follow the focused node", async () => {
    const { app } = await startTestApp();
    const { screen, a, b } = fieldScreen();
    app.navigator.pushScreen(screen);

    assert.equal(app.focus.setFocus(a), true);
    assert.equal(app.focus.setFocus(a), false);
    assert.equal(app.focus.setFocus(b), true);
    assert.deepEqual(a.events, ["focus", "blur"]);
    assert.deepEqual(b.events, ["focus"]);
    assert.equal(a.isFocused, false);
    assert.equal(b.isFocused, true);
  });

  test("rejects targets that are not focusable or outside the scope", async () => {
    const { app } = await startTestApp();
    const { screen } = fieldScreen();
    app.navigator.pushScreen(screen);
    const stray = new Field("stray", 0, 0);
    const label = screen.children[3];
    assert.ok(label !== undefined);

    assert.equal(app.focus.setFocus(stray), false);
    assert.equal(app.focus.setFocus(label), false);
    assert.equal(app.focus.focusedNode, null);
  });

  test("a focused node that becomes hidden loses focus on the next tick", async () => {
    const { app } = await startTestApp();
    const { screen, a } = fieldScreen();
    app.navigator.pushScreen(screen);
    app.focus.setFocus(a);
    hide(a);
    assert.equal(app.focus.focusedNode, a);
    app.tick(0);
    assert.equal(app.focus.focusedNode, null);
    assert.equal(a.isFocused, false);
  });

  test("a dialog confines Tab to its own subtree", async () => {
    const { app, backend } = await startTestApp();
    const { screen, a } = fieldScreen();
    app.navigator.pushScreen(screen);
    app.focus.setFocus(a);

    const dialog = new UiNode({ id: "dialog" });
    const ok = dialog.addChild(new Field("ok", 0, 5));
    const cancel = dialog.addChild(new Field("cancel", 4, 5));
    app.navigator.showDialog(dialog);
    assert.equal(app.focus.focusedNode, ok);

    backend.pressKey(TAB);
    app.tick(0);
    assert.equal(app.focus.focusedNode, cancel);
    backend.pressKey(TAB);
    app.tick(0);
    assert.equal(app.focus.focusedNode, ok);

    assert.equal(app.focus.setFocus(a), false);
    app.navigator.closeDialog();
    assert.equal(app.focus.focusedNode, a);
  });
});
