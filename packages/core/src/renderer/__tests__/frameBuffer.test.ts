import { assert, describe, test } from "@termloom/testkit";
import { isLoomError } from "../../errors.js";
import { createCell } from "../cell.js";
import { FrameBuffer } from "../frameBuffer.js";

const FG = 0xffffff;
const BG = 0x000000;

describe("FrameBuffer.writeText", () => {
  test("a wide grapheme takes a lead cell and a placeholder", () => {
    const fb = new FrameBuffer(5, 1);
    const next = fb.writeText(0, 0, "A漢", FG, BG);
    assert.equal(next, 3);
    assert.deepEqual(fb.getBack(0, 0), { char: "A", fg: FG, bg: BG, width: 1 });
    assert.deepEqual(fb.getBack(1, 0), { char: "漢", fg: FG, bg: BG, width: 2 });
    assert.deepEqual(fb.getBack(2, 0), { char: " ", fg: FG, bg: BG, width: 0 });
    assert.equal(fb.backRowText(0), "A漢  ");
  });

  test("clips to the given rect but still advances the column", () => {
    const fb = new FrameBuffer(5, 2);
    const next = fb.writeText(0, 0, "hello", FG, BG, { x: 1, y: 0, w: 2, h: 1 });
    assert.equal(next, 5);
    assert.equal(fb.backRowText(0), " el  ");
    fb.writeText(0, 1, "zz", FG, BG, { x: 0, y: 0, w: 5, h: 1 });
    assert.equal(fb.backRowText(1), "     ");
  });

  test("a wide grapheme cut by the right edge becomes one space", () => {
    const fb = new FrameBuffer(3, 1);
    fb.writeText(0, 0, "ab", FG, BG);
    assert.equal(fb.writeText(2, 0, "漢", FG, BG), 4);
    assert.deepEqual(fb.getBack(2, 0), { char: " ", fg: FG, bg: BG, width: 1 });
  });

  test("overwriting half of a wide pair blanks the other half", () => {
    const fb = new FrameBuffer(3, 1);
    fb.writeText(0, 0, "漢", FG, BG);
    fb.setBack(1, 0, createCell("x", FG, BG));
    assert.equal(fb.backRowText(0), " x ");
    assert.equal(fb.getBack(0, 0)?.width, 1);

    fb.writeText(1, 0, "漢", FG, BG);
    fb.setBack(1, 0, createCell("y", FG, BG));
    assert.equal(fb.getBack(2, 0)?.width, 1);
    assert.equal(fb.backRowText(0), " y ");
  });

  test("zero-width graphemes are skipped", () => {
    const fb = new FrameBuffer(4, 1);
    assert.equal(fb.writeText(0, 0, "a\u0007b", FG, BG), 2);
    assert.equal(fb.backRowText(0), "ab  ");
  });
});

describe("FrameBuffer sizing", () => {
  test("resize reallocates and forces a full repaint", () => {
    const fb = new FrameBuffer(4, 2);
    fb.markRepainted();
    assert.equal(fb.needsFullRepaint, false);
    fb.resize(4, 2);
    assert.equal(fb.needsFullRepaint, false);
    fb.resize(6, 3);
    assert.equal(fb.needsFullRepaint, true);
    assert.deepEqual(fb.bounds, { x: 0, y: 0, w: 6, h: 3 });
    assert.equal(fb.backCells.length, 18);
  });

  test("out-of-range reads return undefined", () => {
    const fb = new FrameBuffer(2, 2);
    assert.equal(fb.getBack(2, 0), undefined);
    assert.equal(fb.getFront(-1, 0), undefined);
  });

  test("rejects fractional or negative dimensions", () => {
    assert.throws(() => new FrameBuffer(1.5, 2), (e: unknown) => isLoomError(e, "LOOM_INVALID_PROPS"));
    assert.throws(() => new FrameBuffer(2, -1), (e: unknown) => isLoomError(e, "LOOM_INVALID_PROPS"));
  });
});
