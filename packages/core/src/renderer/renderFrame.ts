/**
 * packages/core/src/renderer/renderFrame.ts — Tree walk, paint and diff.
 *
 * Frame pipeline:
 *   1. clear back to the theme background
 *   2. collect effectively-visible nodes: screen children, then the active
 *      dialog tree, then the overlay tree; panels arrange before descent
 *   3. stable sort by zIndex (ties keep visit order)
 *   4. screen chrome (the only direct draw outside the tree walk)
 *   5. paint each node; a throwing node is logged and skipped
 *   6. diff back against front and emit ANSI
 */

import { LoomError, describeThrown } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { type Rect, type Size, intersectRects } from "../layout/types.js";
import type { Screen } from "../runtime/screen.js";
import type { Theme } from "../theme/types.js";
import type { UiNode } from "../tree/node.js";
import { walkEffectivelyVisible } from "../tree/traversal.js";
import { diffFrame } from "./diff.js";
import type { FrameBuffer } from "./frameBuffer.js";
import { PaintContext } from "./paint.js";

const utf8 = new TextEncoder();

/** Roots composed into one frame. */
export type Scene = Readonly<{
  screen: Screen | null;
  dialog: UiNode | null;
  overlay: UiNode | null;
}>;

export type FrameStats = Readonly<{
  output: string;
  bytes: number;
  changedCells: number;
  /** Nodes painted successfully. */
  painted: number;
  /** Nodes (and chrome) whose paint step threw. */
  skipped: number;
  full: boolean;
}>;

/**
 * Collect the render queue for a scene (steps 2 and 3).
 * Exported separately so paint order can be checked without a buffer.
 */
export function collectRenderQueue(scene: Scene, viewport: Size): UiNode[] {
  const queue: UiNode[] = [];
  const push = (node: UiNode): void => {
    queue.push(node);
  };

  const screen = scene.screen;
  if (screen !== null && screen.visible) {
    screen.placeRoot(viewport);
    if (screen.isLayoutPanel) screen.arrange();
    for (const child of screen.children) walkEffectivelyVisible(child, push);
  }
  if (scene.dialog !== null) {
    scene.dialog.placeRoot(viewport);
    walkEffectivelyVisible(scene.dialog, push);
  }
  if (scene.overlay !== null) {
    scene.overlay.placeRoot(viewport);
    walkEffectivelyVisible(scene.overlay, push);
  }

  // Array.prototype.sort is stable: equal zIndex keeps traversal order.
  return queue.sort((a, b) => a.zIndex - b.zIndex);
}

/** A node paints inside its own rect, cut by every enclosing panel. */
export function paintClipFor(node: UiNode): Rect {
  let clip = node.rect;
  for (let p = node.parent; p !== null; p = p.parent) {
    if (p.isLayoutPanel) clip = intersectRects(clip, p.rect);
  }
  return clip;
}

export class Renderer {
  private readonly buffer: FrameBuffer;
  private readonly logger: Logger;
  private readonly theme: Theme;
  private readonly synchronized: boolean;

  constructor(
    opts: Readonly<{
      buffer: FrameBuffer;
      theme: Theme;
      logger: Logger;
      synchronizedOutput?: boolean;
    }>,
  ) {
    this.buffer = opts.buffer;
    this.theme = opts.theme;
    this.logger = opts.logger;
    this.synchronized = opts.synchronizedOutput !== false;
  }

  renderFrame(scene: Scene): FrameStats {
    const buffer = this.buffer;
    const viewport: Size = { w: buffer.cols, h: buffer.rows };
    buffer.clearBack(this.theme.colors.fg, this.theme.colors.bg);

    const queue = collectRenderQueue(scene, viewport);

    let skipped = 0;
    const screen = scene.screen;
    if (screen !== null && screen.visible) {
      const saved = buffer.saveRegion(buffer.bounds);
      try {
        screen.renderChrome(new PaintContext(buffer, this.theme, buffer.bounds));
      } catch (e: unknown) {
        buffer.restoreRegion(saved);
        skipped++;
        this.reportPaintFailure(screen, e);
      }
    }

    let painted = 0;
    for (const node of queue) {
      // A failed node leaves no partial paint behind.
      const clip = paintClipFor(node);
      const saved = buffer.saveRegion(clip);
      try {
        node.render(new PaintContext(buffer, this.theme, clip));
        painted++;
      } catch (e: unknown) {
        buffer.restoreRegion(saved);
        skipped++;
        this.reportPaintFailure(node, e);
      }
    }

    const diff = diffFrame(buffer, { synchronized: this.synchronized });
    return Object.freeze({
      output: diff.output,
      bytes: utf8.encode(diff.output).byteLength,
      changedCells: diff.changedCells,
      painted,
      skipped,
      full: diff.full,
    });
  }

  private reportPaintFailure(node: UiNode, e: unknown): void {
    const err = new LoomError(
      "LOOM_COMPONENT_RENDER",
      `render of "${node.id}" failed: ${describeThrown(e)}`,
      { cause: e },
    );
    this.logger.warn(err.message, err);
  }
}
