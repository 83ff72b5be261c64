/**
 * packages/core/src/widgets/listView.ts — Scrollable single-selection list.
 *
 * Up/Down move the selection, Home/End jump, PageUp/PageDown move by the
 * visible height, Enter selects.
 */

import type { UiContext } from "../app/context.js";
import type { KeyEvent } from "../input/keys.js";
import { truncateWithEllipsis } from "../layout/textMeasure.js";
import type { PaintContext } from "../renderer/paint.js";
import { type NodeProps, UiNode } from "../tree/node.js";

export type ListViewProps<T> = NodeProps &
  Readonly<{
    items?: readonly T[];
    format?: (item: T, index: number) => string;
    emptyText?: string;
    onSelect?: (item: T, index: number, ctx: UiContext) => void;
    onChange?: (index: number, ctx: UiContext) => void;
  }>;

export class ListView<T> extends UiNode {
  private list: readonly T[];
  private selected: number;
  private scrollTop = 0;
  format: (item: T, index: number) => string;
  emptyText: string;
  onSelect: ((item: T, index: number, ctx: UiContext) => void) | undefined;
  onChange: ((index: number, ctx: UiContext) => void) | undefined;

  constructor(props: ListViewProps<T> = {}) {
    super({ focusable: true, ...props });
    this.list = props.items ?? [];
    this.selected = this.list.length > 0 ? 0 : -1;
    this.format = props.format ?? ((item) => String(item));
    this.emptyText = props.emptyText ?? "";
    this.onSelect = props.onSelect;
    this.onChange = props.onChange;
  }

  get items(): readonly T[] {
    return this.list;
  }

  /** -1 when the list is empty. */
  get selectedIndex(): number {
    return this.selected;
  }

  get selectedItem(): T | undefined {
    return this.list[this.selected];
  }

  /** Replace the items, keeping the selection index where it still exists. */
  setItems(items: readonly T[]): void {
    this.list = items;
    if (items.length === 0) this.selected = -1;
    else this.selected = Math.min(Math.max(this.selected, 0), items.length - 1);
    this.clampScroll();
  }

  select(index: number): void {
    if (this.list.length === 0) return;
    this.selected = Math.min(Math.max(Math.floor(index), 0), this.list.length - 1);
    this.clampScroll();
  }

  private clampScroll(): void {
    const visible = Math.max(1, this.height);
    if (this.selected < this.scrollTop) this.scrollTop = Math.max(0, this.selected);
    if (this.selected >= this.scrollTop + visible) this.scrollTop = this.selected - visible + 1;
    this.scrollTop = Math.max(0, Math.min(this.scrollTop, Math.max(0, this.list.length - visible)));
  }

  private move(ctx: UiContext, to: number): void {
    const before = this.selected;
    this.select(to);
    if (this.selected !== before) this.onChange?.(this.selected, ctx);
  }

  override handleInput(ctx: UiContext, key: KeyEvent): boolean {
    if (key.ctrl || key.alt || this.list.length === 0) return false;
    const page = Math.max(1, this.height);
    switch (key.name) {
      case "up":
        this.move(ctx, this.selected - 1);
        return true;
      case "down":
        this.move(ctx, this.selected + 1);
        return true;
      case "home":
        this.move(ctx, 0);
        return true;
      case "end":
        this.move(ctx, this.list.length - 1);
        return true;
      case "pageup":
        this.move(ctx, this.selected - page);
        return true;
      case "pagedown":
        this.move(ctx, this.selected + page);
        return true;
      case "enter": {
        const item = this.list[this.selected];
        if (item !== undefined) this.onSelect?.(item, this.selected, ctx);
        return true;
      }
      default:
        return false;
    }
  }

  override render(ctx: PaintContext): void {
    if (this.list.length === 0) {
      ctx.drawText(this.x, this.y, truncateWithEllipsis(this.emptyText, this.width), { fg: "muted" });
      return;
    }
    this.clampScroll();
    for (let row = 0; row < this.height; row++) {
      const index = this.scrollTop + row;
      const item = this.list[index];
      if (item === undefined) break;
      const y = this.y + row;
      const text = truncateWithEllipsis(this.format(item, index), this.width);
      if (index === this.selected) {
        const style = this.isFocused
          ? ({ fg: "fg", bg: "selection" } as const)
          : ({ fg: "fg", bg: "border" } as const);
        ctx.fill({ x: this.x, y, w: this.width, h: 1 }, style);
        ctx.drawText(this.x, y, text, style);
      } else {
        ctx.drawText(this.x, y, text);
      }
    }
  }
}
