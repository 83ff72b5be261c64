import { FrameBuffer } from "../../renderer/frameBuffer.js";
import { PaintContext } from "../../renderer/paint.js";
import { defaultTheme } from "../../theme/defaultTheme.js";
import type { UiNode } from "../../tree/node.js";

/** Paint one node (not its children) into a fresh buffer. */
export function paintNode(node: UiNode, cols: number, rows: number): FrameBuffer {
  const fb = new FrameBuffer(cols, rows);
  fb.clearBack(defaultTheme.colors.fg, defaultTheme.colors.bg);
  node.render(new PaintContext(fb, defaultTheme, node.rect));
  return fb;
}
