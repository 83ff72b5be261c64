import { assert, describe, test } from "@termloom/testkit";
import { isLoomError } from "../../errors.js";
import { StackPanel } from "../../layout/stackPanel.js";
import { createLogger, nullSink } from "../../logging/logger.js";
import { Screen } from "../../runtime/screen.js";
import { defaultTheme } from "../../theme/defaultTheme.js";
import { UiNode, type NodeProps } from "../../tree/node.js";
import { FrameBuffer } from "../frameBuffer.js";
import type { PaintContext } from "../paint.js";
import { Renderer, collectRenderQueue, paintClipFor } from "../renderFrame.js";

class Recorder extends UiNode {
  constructor(
    private readonly log: string[],
    props: NodeProps,
    private readonly text = "",
  ) {
    super(props);
  }

  override render(ctx: PaintContext): void {
    this.log.push(this.id);
    if (this.text.length > 0) ctx.drawText(this.x, this.y, this.text);
  }
}

class Broken extends UiNode {
  override render(): void {
    throw new Error("boom");
  }
}

/** Paints its text, then fails. */
class HalfBroken extends UiNode {
  constructor(
    props: NodeProps,
    private readonly text: string,
  ) {
    super(props);
  }

  override render(ctx: PaintContext): void {
    ctx.drawText(this.x, this.y, this.text);
    throw new Error("late failure");
  }
}

class HeaderScreen extends Screen {
  override renderChrome(ctx: PaintContext): void {
    ctx.drawText(0, 0, "hdr");
  }
}

function setup(cols = 10, rows = 3) {
  const buffer = new FrameBuffer(cols, rows);
  const logger = createLogger({ sink: nullSink });
  const renderer = new Renderer({ buffer, theme: defaultTheme, logger, synchronizedOutput: false });
  return { buffer, logger, renderer };
}

describe("render queue", () => {
  test("sorts by zIndex and keeps visit order on ties", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "A" }));
    screen.addChild(new Recorder(log, { id: "B", zIndex: 5 }));
    screen.addChild(new Recorder(log, { id: "C" }));
    const { renderer } = setup();
    renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.deepEqual(log, ["A", "C", "B"]);
  });

  test("a dialog paints after the screen on ties and the overlay last", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "A" }));
    screen.addChild(new Recorder(log, { id: "B", zIndex: 5 }));
    const dialog = new Recorder(log, { id: "D" });
    const overlay = new Recorder(log, { id: "T", zIndex: 1000 });
    const queue = collectRenderQueue({ screen, dialog, overlay }, { w: 10, h: 3 });
    assert.deepEqual(
      queue.map((n) => n.id),
      ["A", "D", "B", "T"],
    );
  });

  test("invisible subtrees and hidden screens are left out", () => {
    const log: string[] = [];
    const screen = new Screen();
    const hidden = screen.addChild(new Recorder(log, { id: "H", visible: false }));
    hidden.addChild(new Recorder(log, { id: "H1" }));
    screen.addChild(new Recorder(log, { id: "V" }));
    assert.deepEqual(
      collectRenderQueue({ screen, dialog: null, overlay: null }, { w: 10, h: 3 }).map((n) => n.id),
      ["V"],
    );
    screen.visible = false;
    assert.equal(collectRenderQueue({ screen, dialog: null, overlay: null }, { w: 10, h: 3 }).length, 0);
  });

  test("the screen root fills the viewport", () => {
    const screen = new Screen();
    collectRenderQueue({ screen, dialog: null, overlay: null }, { w: 12, h: 4 });
    assert.deepEqual(screen.rect, { x: 0, y: 0, w: 12, h: 4 });
  });
});

describe("Renderer.renderFrame", () => {
  test("the first frame is full and an unchanged frame writes zero bytes", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "A", x: 1, y: 1, width: 5, height: 1 }, "hi"));
    const { renderer, buffer } = setup();

    const first = renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(first.full, true);
    assert.equal(first.changedCells, 30);
    assert.ok(first.bytes > 0);
    assert.equal(buffer.backRowText(1), " hi       ");

    const second = renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(second.full, false);
    assert.equal(second.bytes, 0);
    const third = renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(third.output, "");
    assert.equal(third.bytes, 0);
  });

  test("paints nodes only inside their own rect", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "A", x: 0, y: 0, width: 3, height: 1 }, "abcdef"));
    const { renderer, buffer } = setup();
    renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(buffer.backRowText(0), "abc       ");
  });

  test("enclosing panels cut the paint clip", () => {
    const panel = new StackPanel({ x: 2, y: 0, width: 4, height: 2 });
    const child = panel.addChild(new UiNode({ width: 3, height: 5 }));
    panel.arrange();
    child.setSize(10, 5);
    assert.deepEqual(paintClipFor(child), { x: 2, y: 0, w: 4, h: 2 });
  });

  test("a throwing node is skipped and logged", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "A" }));
    screen.addChild(new Broken({ id: "bad" }));
    screen.addChild(new Recorder(log, { id: "C" }));
    const { renderer, logger } = setup();

    const stats = renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(stats.painted, 2);
    assert.equal(stats.skipped, 1);
    assert.deepEqual(log, ["A", "C"]);

    const records = logger.records();
    assert.equal(records.length, 1);
    const record = records[0];
    assert.ok(record !== undefined);
    assert.equal(record.level, "warn");
    assert.equal(record.message, 'render of "bad" failed: Error: boom');
    assert.ok(isLoomError(record.detail, "LOOM_COMPONENT_RENDER"));
  });

  test("a node failing mid-paint leaves the cells under it untouched", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "under", width: 10, height: 1 }, "under"));
    screen.addChild(new HalfBroken({ id: "half", width: 2, height: 1 }, "XY"));
    const { renderer, buffer } = setup();

    const stats = renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(stats.skipped, 1);
    assert.equal(buffer.backRowText(0), "under     ");
  });

  test("a failed paint also undoes wide-pair repairs beside its clip", () => {
    const log: string[] = [];
    const screen = new Screen();
    screen.addChild(new Recorder(log, { id: "under", width: 10, height: 1 }, "a\u6f22b"));
    screen.addChild(new HalfBroken({ id: "half", x: 2, width: 1, height: 1 }, "Z"));
    const { renderer, buffer } = setup();

    renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(buffer.backRowText(0), "a\u6f22b      ");
    assert.equal(buffer.getBack(1, 0)?.width, 2);
  });

  test("chrome is drawn under the tree", () => {
    const log: string[] = [];
    const screen = new HeaderScreen();
    screen.addChild(new Recorder(log, { id: "A", x: 1, y: 0, width: 1, height: 1 }, "X"));
    const { renderer, buffer } = setup();
    renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(buffer.backRowText(0), "hXr       ");
  });

  test("text without a background keeps the panel fill", () => {
    const screen = new Screen();
    const panel = screen.addChild(
      new StackPanel({ width: 10, height: 1, background: "surface" }),
    );
    panel.addChild(new Recorder([], { id: "L", width: 4, height: 1 }, "hi"));
    const { renderer, buffer } = setup();
    renderer.renderFrame({ screen, dialog: null, overlay: null });
    assert.equal(buffer.getBack(0, 0)?.bg, defaultTheme.colors.surface);
    assert.equal(buffer.getBack(9, 0)?.bg, defaultTheme.colors.surface);
    assert.equal(buffer.getBack(0, 1)?.bg, defaultTheme.colors.bg);
  });
});
