import {
  Box,
  type KeyEvent,
  Label,
  type PaintContext,
  Screen,
  type Size,
  type UiContext,
} from "@termloom/core";
import { HELP_LINES } from "../helpers/keybindings.js";

/** Key reference; Escape or q returns to the board. */
export class HelpScreen extends Screen {
  private readonly box: Box;

  constructor() {
    super({ id: "help", title: "Keys" });
    this.box = this.addChild(new Box({ title: "Keys", border: "double", padding: { left: 1 } }));
    for (const line of HELP_LINES) this.box.addChild(new Label({ text: line }));
  }

  override layout(viewport: Size): void {
    const w = Math.min(viewport.w, 40);
    const h = Math.min(viewport.h, this.box.measureMainAxis());
    this.box.setBounds({ x: Math.floor((viewport.w - w) / 2), y: 1, w, h });
  }

  override renderChrome(ctx: PaintContext): void {
    ctx.drawText(1, this.height - 1, "esc back", { fg: "muted" });
  }

  override handleInput(ctx: UiContext, key: KeyEvent): boolean {
    if (key.ctrl || key.alt) return false;
    if (key.name !== "escape" && key.name !== "q") return false;
    ctx.navigator.popScreen();
    return true;
  }
}
