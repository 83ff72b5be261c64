/**
 * packages/core/src/widgets/textInput.ts — Single-line text editor.
 *
 * The cursor is a grapheme index. The visible window scrolls horizontally so
 * the cursor cell stays on screen; the cursor cell is drawn inverted while
 * the input is focused.
 */

import type { UiContext } from "../app/context.js";
import { type KeyEvent, printableText } from "../input/keys.js";
import { graphemeWidth, splitGraphemes } from "../layout/textMeasure.js";
import type { PaintContext } from "../renderer/paint.js";
import { type NodeProps, UiNode } from "../tree/node.js";

export type TextInputProps = NodeProps &
  Readonly<{
    value?: string;
    placeholder?: string;
    /** Maximum length in graphemes. */
    maxLength?: number;
    onChange?: (value: string, ctx: UiContext) => void;
    onSubmit?: (value: string, ctx: UiContext) => void;
  }>;

export class TextInput extends UiNode {
  private graphemes: string[];
  private cursorIndex: number;
  private scrollIndex = 0;
  placeholder: string;
  readonly maxLength: number;
  onChange: ((value: string, ctx: UiContext) => void) | undefined;
  onSubmit: ((value: string, ctx: UiContext) => void) | undefined;

  constructor(props: TextInputProps = {}) {
    super({ height: 1, width: 20, focusable: true, ...props });
    this.graphemes = splitGraphemes(props.value ?? "");
    this.cursorIndex = this.graphemes.length;
    this.placeholder = props.placeholder ?? "";
    this.maxLength = props.maxLength ?? Number.POSITIVE_INFINITY;
    this.onChange = props.onChange;
    this.onSubmit = props.onSubmit;
  }

  get value(): string {
    return this.graphemes.join("");
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  /** Replace the content and move the cursor to the end. */
  setValue(value: string): void {
    this.graphemes = splitGraphemes(value);
    this.cursorIndex = this.graphemes.length;
    this.scrollIndex = 0;
  }

  override handleInput(ctx: UiContext, key: KeyEvent): boolean {
    const text = printableText(key);
    if (text !== null) {
      const inserted = splitGraphemes(text).slice(0, this.maxLength - this.graphemes.length);
      if (inserted.length === 0) return true;
      this.graphemes.splice(this.cursorIndex, 0, ...inserted);
      this.cursorIndex += inserted.length;
      this.changed(ctx);
      return true;
    }
    if (key.ctrl || key.alt) return false;

    switch (key.name) {
      case "backspace":
        if (this.cursorIndex > 0) {
          this.graphemes.splice(this.cursorIndex - 1, 1);
          this.cursorIndex--;
          this.changed(ctx);
        }
        return true;
      case "delete":
        if (this.cursorIndex < this.graphemes.length) {
          this.graphemes.splice(this.cursorIndex, 1);
          this.changed(ctx);
        }
        return true;
      case "left":
        this.cursorIndex = Math.max(0, this.cursorIndex - 1);
        return true;
      case "right":
        this.cursorIndex = Math.min(this.graphemes.length, this.cursorIndex + 1);
        return true;
      case "home":
        this.cursorIndex = 0;
        return true;
      case "end":
        this.cursorIndex = this.graphemes.length;
        return true;
      case "enter":
        this.onSubmit?.(this.value, ctx);
        return true;
      default:
        return false;
    }
  }

  private changed(ctx: UiContext): void {
    this.onChange?.(this.value, ctx);
  }

  /** Keep the cursor cell inside the visible width. */
  private updateScroll(): void {
    if (this.cursorIndex < this.scrollIndex) this.scrollIndex = this.cursorIndex;
    const cursorCell = this.cursorIndex < this.graphemes.length ? 0 : 1;
    let used = cursorCell;
    for (let i = this.scrollIndex; i < this.cursorIndex; i++) used += graphemeWidth(this.graphemes[i] ?? "");
    while (used > this.width && this.scrollIndex < this.cursorIndex) {
      used -= graphemeWidth(this.graphemes[this.scrollIndex] ?? "");
      this.scrollIndex++;
    }
  }

  override render(ctx: PaintContext): void {
    ctx.fill(this.rect, { bg: "surface" });
    if (this.graphemes.length === 0 && !this.isFocused) {
      ctx.drawText(this.x, this.y, this.placeholder, { fg: "muted", bg: "surface" });
      return;
    }

    this.updateScroll();
    let x = this.x;
    for (let i = this.scrollIndex; i < this.graphemes.length; i++) {
      const g = this.graphemes[i] ?? "";
      const atCursor = this.isFocused && i === this.cursorIndex;
      x = ctx.drawText(x, this.y, g, atCursor ? { fg: "surface", bg: "fg" } : { bg: "surface" });
      if (x >= this.x + this.width) break;
    }
    if (this.isFocused && this.cursorIndex === this.graphemes.length) {
      ctx.drawText(x, this.y, " ", { fg: "surface", bg: "fg" });
    }
  }
}
