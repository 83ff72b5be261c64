/**
 * packages/core/src/tree/visibility.ts — Composite show/hide.
 *
 * Both operations are unconditional and recursive: a hidden container never
 * keeps a visible or focusable descendant behind, and showing a container
 * reveals its whole subtree.
 */

import type { UiNode } from "./node.js";
import { walkAll } from "./traversal.js";

export function hide(node: UiNode): void {
  walkAll(node, (n) => {
    n.visible = false;
  });
}

export function show(node: UiNode): void {
  walkAll(node, (n) => {
    n.visible = true;
  });
}

export function setVisible(node: UiNode, visible: boolean): void {
  if (visible) show(node);
  else hide(node);
}
