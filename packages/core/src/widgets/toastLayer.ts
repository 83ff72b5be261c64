/**
 * packages/core/src/widgets/toastLayer.ts — Notification overlay.
 *
 * Painted after the dialog tree with a high zIndex. Toasts stack upward from
 * the bottom-right corner, newest at the bottom.
 */

import type { NotificationCenter, NotificationLevel } from "../app/notifications.js";
import { measureTextCells, truncateWithEllipsis } from "../layout/textMeasure.js";
import type { Size } from "../layout/types.js";
import type { PaintContext } from "../renderer/paint.js";
import type { ThemeColorName } from "../theme/types.js";
import { UiNode } from "../tree/node.js";

export const TOAST_LAYER_Z_INDEX = 1000;

const LEVEL_COLORS: Readonly<Record<NotificationLevel, ThemeColorName>> = Object.freeze({
  info: "info",
  success: "success",
  warning: "warning",
  error: "danger",
});

export class ToastLayer extends UiNode {
  private readonly center: NotificationCenter;

  constructor(center: NotificationCenter) {
    super({ id: "toast-layer", zIndex: TOAST_LAYER_Z_INDEX });
    this.center = center;
  }

  override placeRoot(viewport: Size): void {
    const active = this.center.active;
    let widest = 0;
    for (const n of active) widest = Math.max(widest, measureTextCells(n.message) + 2);
    const w = Math.min(widest, Math.max(0, viewport.w - 2));
    const h = Math.min(active.length, Math.max(0, viewport.h - 1));
    this.setBounds({
      x: Math.max(0, viewport.w - w - 1),
      y: Math.max(0, viewport.h - h - 1),
      w,
      h,
    });
  }

  override render(ctx: PaintContext): void {
    const active = this.center.active;
    const shown = active.slice(active.length - this.height);
    for (let i = 0; i < shown.length; i++) {
      const n = shown[i];
      if (n === undefined) continue;
      const y = this.y + i;
      const style = { fg: "bg", bg: LEVEL_COLORS[n.level] } as const;
      ctx.fill({ x: this.x, y, w: this.width, h: 1 }, style);
      ctx.drawText(this.x + 1, y, truncateWithEllipsis(n.message, this.width - 2), style);
    }
  }
}
