/**
 * packages/core/src/input/keyBinding.ts — Parse binding strings like "ctrl+s".
 *
 * Format:
 *   - Single key: "a", "escape", "f1"
 *   - With modifiers: "ctrl+s", "shift+tab", "ctrl+alt+x"
 *
 * Modifier names (case-insensitive): shift; ctrl, control; alt, option.
 * Key names are the names decodeKeys() produces, plus a few aliases
 * (esc, return, del, pgup, pgdn).
 */

import { invalidProps } from "../errors.js";
import type { KeyEvent } from "./keys.js";

export type KeyBinding = Readonly<{
  name: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}>;

export type KeyBindingErrorCode = "EMPTY_BINDING" | "INVALID_KEY" | "INVALID_MODIFIER";

export type ParseKeyBindingResult =
  | Readonly<{ ok: true; value: KeyBinding }>
  | Readonly<{ ok: false; error: Readonly<{ code: KeyBindingErrorCode; detail: string }> }>;

const NAMED_KEYS: ReadonlySet<string> = new Set([
  "enter",
  "tab",
  "backspace",
  "space",
  "escape",
  "up",
  "down",
  "left",
  "right",
  "home",
  "end",
  "pageup",
  "pagedown",
  "insert",
  "delete",
  "f1",
  "f2",
  "f3",
  "f4",
  "f5",
  "f6",
  "f7",
  "f8",
  "f9",
  "f10",
  "f11",
  "f12",
]);

const KEY_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  esc: "escape",
  return: "enter",
  del: "delete",
  pgup: "pageup",
  pgdn: "pagedown",
});

type Modifier = "shift" | "ctrl" | "alt";

const MODIFIER_NAMES: Readonly<Record<string, Modifier>> = Object.freeze({
  shift: "shift",
  ctrl: "ctrl",
  control: "ctrl",
  alt: "alt",
  option: "alt",
});

function fail(code: KeyBindingErrorCode, detail: string): ParseKeyBindingResult {
  return { ok: false, error: { code, detail } };
}

export function parseKeyBinding(input: string): ParseKeyBindingResult {
  const trimmed = input.trim().toLowerCase();
  if (trimmed.length === 0) return fail("EMPTY_BINDING", "key binding string is empty");

  // "ctrl++" binds the plus key
  const pieces = trimmed.endsWith("++")
    ? [...trimmed.slice(0, -2).split("+"), "+"]
    : trimmed.split("+");
  const seen = new Set<Modifier>();
  let keyName: string | undefined;

  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i];
    if (piece === undefined || piece.length === 0) {
      return fail("INVALID_KEY", `empty component in "${input}"`);
    }
    const isLast = i === pieces.length - 1;
    const modifier = isLast ? undefined : MODIFIER_NAMES[piece];
    if (!isLast) {
      if (modifier === undefined) {
        return fail("INVALID_MODIFIER", `"${piece}" is not a valid modifier in "${input}"`);
      }
      if (seen.has(modifier)) {
        return fail("INVALID_MODIFIER", `duplicate modifier "${piece}" in "${input}"`);
      }
      seen.add(modifier);
      continue;
    }
    if (MODIFIER_NAMES[piece] !== undefined) {
      return fail("INVALID_KEY", `modifier "${piece}" cannot be the final key in "${input}"`);
    }
    keyName = KEY_ALIASES[piece] ?? piece;
  }

  if (keyName === undefined) return fail("INVALID_KEY", `no key found in "${input}"`);
  if (!NAMED_KEYS.has(keyName) && [...keyName].length !== 1) {
    return fail("INVALID_KEY", `unknown key "${keyName}" in "${input}"`);
  }

  return {
    ok: true,
    value: Object.freeze({
      name: keyName,
      ctrl: seen.has("ctrl"),
      alt: seen.has("alt"),
      shift: seen.has("shift"),
    }),
  };
}

/** parseKeyBinding() that throws LOOM_INVALID_PROPS on bad input. */
export function requireKeyBinding(input: string): KeyBinding {
  const res = parseKeyBinding(input);
  if (!res.ok) invalidProps(`invalid key binding "${input}": ${res.error.detail}`);
  return res.value;
}

export function matchesKey(event: KeyEvent, binding: KeyBinding): boolean {
  return (
    event.name === binding.name &&
    event.ctrl === binding.ctrl &&
    event.alt === binding.alt &&
    event.shift === binding.shift
  );
}

/** "ctrl+shift+tab" style label for a binding or event. */
export function keyToString(key: KeyBinding | KeyEvent): string {
  const parts: string[] = [];
  if (key.ctrl) parts.push("ctrl");
  if (key.alt) parts.push("alt");
  if (key.shift) parts.push("shift");
  parts.push(key.name);
  return parts.join("+");
}
