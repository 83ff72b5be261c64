import { assert, describe, test } from "@termloom/testkit";
import { isLoomError } from "../../errors.js";
import { UiNode } from "../../tree/node.js";
import { GridPanel } from "../gridPanel.js";
import { fixed, weighted } from "../tracks.js";

function grid(): GridPanel {
  return new GridPanel({
    width: 50,
    height: 10,
    columns: [fixed(10), weighted(1), weighted(3)],
    rows: [fixed(2), weighted(1)],
  });
}

describe("GridPanel", () => {
  test("places children in their tracks", () => {
    const g = grid();
    const a = g.place(new UiNode(), 0, 0);
    const b = g.place(new UiNode(), 1, 2);
    g.arrange();

    assert.deepEqual(g.resolveTracks(), { columnWidths: [10, 10, 30], rowHeights: [2, 8] });
    assert.deepEqual(a.rect, { x: 0, y: 0, w: 10, h: 2 });
    assert.deepEqual(b.rect, { x: 20, y: 2, w: 30, h: 8 });
  });

  test("clamps out-of-range indices to the last track", () => {
    const g = grid();
    const c = g.place(new UiNode(), 5, 9);
    g.arrange();
    assert.deepEqual(c.rect, { x: 20, y: 2, w: 30, h: 8 });
  });

  test("spans add track extents", () => {
    const g = grid();
    const d = g.place(new UiNode(), 0, 1, 1, 2);
    const e = g.place(new UiNode(), 0, 2, 4, 4);
    g.arrange();
    assert.deepEqual(d.rect, { x: 10, y: 0, w: 40, h: 2 });
    assert.deepEqual(e.rect, { x: 20, y: 0, w: 30, h: 10 });
  });

  test("gap and padding shrink the content area", () => {
    const g = new GridPanel({
      x: 1,
      y: 1,
      width: 12,
      height: 3,
      padding: 1,
      gap: 2,
      columns: [weighted(), weighted()],
    });
    const left = g.place(new UiNode(), 0, 0);
    const right = g.place(new UiNode(), 0, 1);
    g.arrange();
    assert.deepEqual(left.rect, { x: 2, y: 2, w: 4, h: 1 });
    assert.deepEqual(right.rect, { x: 8, y: 2, w: 4, h: 1 });
  });

  test("children added without place() sit in the first cell", () => {
    const g = grid();
    const n = g.addChild(new UiNode());
    g.arrange();
    assert.deepEqual(g.placementOf(n), { row: 0, column: 0, rowSpan: 1, columnSpan: 1 });
    assert.deepEqual(n.rect, { x: 0, y: 0, w: 10, h: 2 });
  });

  test("rejects bad placements", () => {
    const g = grid();
    assert.throws(
      () => g.place(new UiNode(), -1, 0),
      (e: unknown) => isLoomError(e, "LOOM_INVALID_PROPS"),
    );
    assert.throws(
      () => g.place(new UiNode(), 0, 0, 0),
      (e: unknown) => isLoomError(e, "LOOM_INVALID_PROPS"),
    );
  });
});
