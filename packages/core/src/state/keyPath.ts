/**
 * packages/core/src/state/keyPath.ts — Dot-separated key path helpers.
 *
 * Reads never throw on missing segments. Writes are copy-on-write: every
 * container on the path is cloned and frozen, so earlier roots stay valid
 * snapshots.
 */

import { invalidProps } from "../errors.js";

export type StateTree = Readonly<Record<string, unknown>>;

function isContainer(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isPlainData(v: unknown): v is object {
  if (typeof v !== "object" || v === null) return false;
  if (Array.isArray(v)) return true;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function splitKeyPath(path: string): readonly string[] {
  if (typeof path !== "string" || path.length === 0) {
    invalidProps("key path must be a non-empty string");
  }
  const segments = path.split(".");
  for (const seg of segments) {
    if (seg.length === 0) invalidProps(`key path "${path}" has an empty segment`);
  }
  return segments;
}

export function getAtPath(root: unknown, segments: readonly string[]): unknown {
  let current: unknown = root;
  for (const seg of segments) {
    if (!isContainer(current) || !Object.hasOwn(current, seg)) return undefined;
    current = current[seg];
  }
  return current;
}

function cloneContainer(v: unknown): Record<string, unknown> {
  if (Array.isArray(v)) return Object.assign([], v);
  if (isContainer(v)) return { ...v };
  return {};
}

/** New root with `value` stored at `segments`; missing containers are created. */
export function setAtPath(root: StateTree, segments: readonly string[], value: unknown): StateTree {
  const last = segments.length - 1;
  if (last < 0) return root;

  const spine: Record<string, unknown>[] = [cloneContainer(root)];
  for (let i = 0; i < last; i++) {
    const seg = segments[i] ?? "";
    const parent = spine[i] ?? {};
    const child = cloneContainer(parent[seg]);
    parent[seg] = child;
    spine.push(child);
  }
  const target = spine[last] ?? {};
  target[segments[last] ?? ""] = value;

  for (const container of spine) Object.freeze(container);
  return spine[0] ?? root;
}

/**
 * Frozen copy of plain objects and arrays, recursively. The argument is left
 * as it was; frozen values and class instances are kept by reference.
 */
export function frozenCopy(value: unknown): unknown {
  if (!isPlainData(value) || Object.isFrozen(value)) return value;
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy));
  return frozenTree(value);
}

/** Frozen copy of a state root; see frozenCopy(). */
export function frozenTree(root: object): StateTree {
  const entries = Object.entries(root).map(([k, v]): [string, unknown] => [k, frozenCopy(v)]);
  return Object.freeze(Object.fromEntries(entries));
}
