/**
 * packages/core/src/widgets/dialogFrame.ts — Centered modal panel.
 *
 * Used as a dialog root: placeRoot() centers it in the viewport and Escape
 * closes it while it is the active dialog.
 */

import type { UiContext } from "../app/context.js";
import type { KeyEvent } from "../input/keys.js";
import type { Size } from "../layout/types.js";
import { Box, type BoxProps } from "./box.js";

export type DialogFrameProps = BoxProps &
  Readonly<{
    /** Default true. */
    closeOnEscape?: boolean;
    onClosed?: (ctx: UiContext) => void;
  }>;

export class DialogFrame extends Box {
  closeOnEscape: boolean;
  onClosed: ((ctx: UiContext) => void) | undefined;
  /** Size requested before clamping to the viewport. */
  preferredSize: Size;

  constructor(props: DialogFrameProps = {}) {
    super({ border: "rounded", background: "surface", padding: { left: 1, right: 1 }, ...props });
    this.closeOnEscape = props.closeOnEscape !== false;
    this.onClosed = props.onClosed;
    this.preferredSize = { w: this.width, h: this.height };
  }

  override placeRoot(viewport: Size): void {
    const w = Math.min(this.preferredSize.w, viewport.w);
    const h = Math.min(this.preferredSize.h, viewport.h);
    this.setBounds({
      x: Math.floor((viewport.w - w) / 2),
      y: Math.floor((viewport.h - h) / 2),
      w,
      h,
    });
  }

  override handleInput(ctx: UiContext, key: KeyEvent): boolean {
    if (!this.closeOnEscape || key.name !== "escape" || key.ctrl || key.alt || key.shift) return false;
    if (ctx.navigator.activeDialog !== this) return false;
    ctx.navigator.closeDialog();
    return true;
  }

  override onClose(ctx: UiContext): void {
    this.onClosed?.(ctx);
  }
}
