/**
 * packages/core/src/tree/node.ts — Retained component tree node.
 *
 * Every component, panel, screen and dialog root is a UiNode. Children are
 * exclusively owned: attaching a node detaches it from its previous parent,
 * and cycles are rejected. Coordinates are absolute screen cells.
 *
 * Subclasses override the hooks they need:
 *   - render(ctx): paint into the back buffer (clipped to the node's rect)
 *   - handleInput(ctx, key): return true when the key was consumed
 *   - onFocus(ctx) / onBlur(ctx): focus transitions
 *   - onClose(ctx): the node was closed as a dialog root
 *   - arrange(): position children (layout panels only)
 *   - placeRoot(viewport): position the node when it is a screen/dialog root
 */

import type { UiContext } from "../app/context.js";
import { invalidProps } from "../errors.js";
import type { KeyEvent } from "../input/keys.js";
import type { Rect, Size } from "../layout/types.js";
import type { PaintContext } from "../renderer/paint.js";

export type NodeProps = Readonly<{
  id?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  visible?: boolean;
  zIndex?: number;
  focusable?: boolean;
}>;

let nextAutoId = 1;

function cells(v: number | undefined, fallback: number): number {
  if (v === undefined || !Number.isFinite(v)) return fallback;
  return Math.floor(v);
}

export class UiNode {
  readonly id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  visible: boolean;
  zIndex: number;
  focusable: boolean;
  /** Maintained by the focus manager only. */
  isFocused = false;

  private parentNode: UiNode | null = null;
  private readonly childNodes: UiNode[] = [];

  constructor(props: NodeProps = {}) {
    this.id = props.id ?? `node-${String(nextAutoId++)}`;
    this.x = cells(props.x, 0);
    this.y = cells(props.y, 0);
    this.width = Math.max(0, cells(props.width, 0));
    this.height = Math.max(0, cells(props.height, 0));
    this.visible = props.visible ?? true;
    this.zIndex = cells(props.zIndex, 0);
    this.focusable = props.focusable ?? false;
  }

  get parent(): UiNode | null {
    return this.parentNode;
  }

  get children(): readonly UiNode[] {
    return this.childNodes;
  }

  get rect(): Rect {
    return Object.freeze({ x: this.x, y: this.y, w: this.width, h: this.height });
  }

  /** Layout panels arrange their children before traversal visits them. */
  get isLayoutPanel(): boolean {
    return false;
  }

  addChild<T extends UiNode>(child: T): T {
    if (child === this || child.isAncestorOf(this)) {
      invalidProps(`addChild: "${child.id}" cannot become a descendant of itself`);
    }
    child.parentNode?.removeChild(child);
    this.childNodes.push(child);
    child.parentNode = this;
    return child;
  }

  removeChild(child: UiNode): boolean {
    const idx = this.childNodes.indexOf(child);
    if (idx < 0) return false;
    this.childNodes.splice(idx, 1);
    child.parentNode = null;
    return true;
  }

  clearChildren(): void {
    for (const child of this.childNodes) child.parentNode = null;
    this.childNodes.length = 0;
  }

  isAncestorOf(node: UiNode): boolean {
    for (let p = node.parentNode; p !== null; p = p.parentNode) {
      if (p === this) return true;
    }
    return false;
  }

  setPosition(x: number, y: number): void {
    this.x = Math.floor(x);
    this.y = Math.floor(y);
  }

  setSize(width: number, height: number): void {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
  }

  setBounds(rect: Rect): void {
    this.setPosition(rect.x, rect.y);
    this.setSize(rect.w, rect.h);
  }

  arrange(): void {}

  placeRoot(_viewport: Size): void {}

  render(_ctx: PaintContext): void {}

  handleInput(_ctx: UiContext, _key: KeyEvent): boolean {
    return false;
  }

  onFocus(_ctx: UiContext): void {}

  onBlur(_ctx: UiContext): void {}

  onClose(_ctx: UiContext): void {}
}
