/**
 * packages/core/src/tree/traversal.ts — Shared visible-subtree walk.
 *
 * The renderer and the focus manager both walk the tree through here so the
 * visibility rule is applied the same way everywhere:
 *   - pre-order, children left to right
 *   - a node with visible=false is skipped together with its whole subtree
 *   - a layout panel arranges its children before they are visited
 */

import type { UiNode } from "./node.js";

export type VisitOptions = Readonly<{
  /** Run panel layout before visiting children. Default true. */
  arrange?: boolean;
}>;

/**
 * Visit every effectively-visible node under (and including) `root`.
 *
 * `root` is treated as effectively visible when its own flag is set; callers
 * that start below the tree root check ancestors with isEffectivelyVisible().
 */
export function walkEffectivelyVisible(
  root: UiNode,
  visit: (node: UiNode) => void,
  opts: VisitOptions = {},
): void {
  const arrange = opts.arrange !== false;
  const stack: UiNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || !node.visible) continue;
    if (arrange && node.isLayoutPanel) node.arrange();
    visit(node);
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

export function collectEffectivelyVisible(root: UiNode, opts: VisitOptions = {}): UiNode[] {
  const out: UiNode[] = [];
  walkEffectivelyVisible(root, (node) => out.push(node), opts);
  return out;
}

/** visible && every ancestor visible. */
export function isEffectivelyVisible(node: UiNode): boolean {
  for (let n: UiNode | null = node; n !== null; n = n.parent) {
    if (!n.visible) return false;
  }
  return true;
}

/** Pre-order walk over every node regardless of visibility. */
export function walkAll(root: UiNode, visit: (node: UiNode) => void): void {
  const stack: UiNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) continue;
    visit(node);
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}
