/**
 * packages/core/src/runtime/focus.ts — Focus state and tab order.
 *
 * One node at most holds focus. Candidates are the effectively-visible,
 * focusable nodes under the active scope root (the top dialog when one is
 * open, else the current screen), in row-major order. The list is recomputed
 * on every navigation; trees are small.
 */

import type { UiContext } from "../app/context.js";
import type { UiNode } from "../tree/node.js";
import { isEffectivelyVisible, walkEffectivelyVisible } from "../tree/traversal.js";

export type FocusMove = "next" | "prev";

/**
 * Compute the next focused entry for a tab move.
 *
 * Unfocused (or focused outside the list): first for "next", last for "prev".
 * Otherwise step one entry with wraparound.
 */
export function computeMovedFocus<T>(list: readonly T[], focused: T | null, move: FocusMove): T | null {
  const n = list.length;
  if (n === 0) return null;

  const first = list[0];
  const last = list[n - 1];
  if (first === undefined || last === undefined) return null;

  if (focused === null) return move === "next" ? first : last;

  const idx = list.indexOf(focused);
  if (idx < 0) return move === "next" ? first : last;

  const nextIdx = move === "next" ? (idx + 1) % n : (idx - 1 + n) % n;
  return list[nextIdx] ?? null;
}

/** Focusable, effectively-visible nodes under `root`, sorted by y then x. */
export function computeTabOrder(root: UiNode | null): UiNode[] {
  if (root === null || !isEffectivelyVisible(root)) return [];
  const candidates: UiNode[] = [];
  walkEffectivelyVisible(root, (node) => {
    if (node.focusable) candidates.push(node);
  });
  // Stable: equal positions keep traversal order.
  return candidates.sort((a, b) => a.y - b.y || a.x - b.x);
}

export type FocusManagerOptions = Readonly<{
  /** Active dialog root, else the current screen. */
  scopeRoot: () => UiNode | null;
  /** Context handed to onFocus/onBlur hooks. */
  context: () => UiContext;
  /** Called after every focus change. */
  onChange?: (previous: UiNode | null, next: UiNode | null) => void;
}>;

export class FocusManager {
  private focused: UiNode | null = null;
  private readonly scopeRoot: () => UiNode | null;
  private readonly context: () => UiContext;
  private readonly onChange: ((previous: UiNode | null, next: UiNode | null) => void) | undefined;

  constructor(opts: FocusManagerOptions) {
    this.scopeRoot = opts.scopeRoot;
    this.context = opts.context;
    this.onChange = opts.onChange;
  }

  get focusedNode(): UiNode | null {
    return this.focused;
  }

  /** Focusable, effectively visible and inside the active scope. */
  isValidTarget(node: UiNode): boolean {
    if (!node.focusable || !isEffectivelyVisible(node)) return false;
    const root = this.scopeRoot();
    return root !== null && (root === node || root.isAncestorOf(node));
  }

  /**
   * Move focus to `node`, or clear it with null.
   * Invalid targets leave focus unchanged. Returns whether focus changed.
   */
  setFocus(node: UiNode | null): boolean {
    if (node === this.focused) return false;
    if (node !== null && !this.isValidTarget(node)) return false;

    const previous = this.focused;
    const ctx = this.context();
    if (previous !== null) {
      previous.isFocused = false;
      this.focused = null;
      previous.onBlur(ctx);
    }
    if (node !== null) {
      node.isFocused = true;
      this.focused = node;
      node.onFocus(ctx);
    }
    this.onChange?.(previous, node);
    return true;
  }

  /** Candidates of the active scope in tab order. */
  tabOrder(): UiNode[] {
    return computeTabOrder(this.scopeRoot());
  }

  /** Tab (or Shift+Tab with reverse) to the next candidate; returns the focused node. */
  tabNavigate(reverse = false): UiNode | null {
    const next = computeMovedFocus(this.tabOrder(), this.focused, reverse ? "prev" : "next");
    if (next !== null) this.setFocus(next);
    return this.focused;
  }

  /** Focus the first candidate of the active scope, if any. */
  focusFirst(): UiNode | null {
    const first = this.tabOrder()[0];
    if (first !== undefined) this.setFocus(first);
    return this.focused;
  }

  /** Clear focus when the focused node stopped being a valid target. */
  validate(): boolean {
    if (this.focused === null || this.isValidTarget(this.focused)) return false;
    return this.setFocus(null);
  }
}
