/**
 * packages/core/src/input/keys.ts — Key events and terminal input decoding.
 *
 * Decodes the text a raw-mode terminal sends (already UTF-8 decoded) into key
 * events. Covers the sequences xterm-compatible terminals send for arrows,
 * navigation keys, F1-F12, shift+tab, ctrl+letter, alt+key and plain text.
 * Bracketed-paste markers and unrecognized CSI sequences produce no event.
 */

export type KeyEvent = Readonly<{
  /** Lower-case key name: "a", "enter", "tab", "up", "f5", "space", ... */
  name: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  /** Raw input that produced the event. */
  sequence: string;
}>;

export type KeyModifiers = Readonly<{
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
}>;

export function keyEvent(name: string, mods: KeyModifiers = {}, sequence = ""): KeyEvent {
  return Object.freeze({
    name,
    ctrl: mods.ctrl === true,
    alt: mods.alt === true,
    shift: mods.shift === true,
    sequence,
  });
}

const CSI_LETTER_KEYS: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
  H: "home",
  F: "end",
  P: "f1",
  Q: "f2",
  R: "f3",
  S: "f4",
});

const CSI_TILDE_KEYS: Readonly<Record<string, string>> = Object.freeze({
  "1": "home",
  "2": "insert",
  "3": "delete",
  "4": "end",
  "5": "pageup",
  "6": "pagedown",
  "7": "home",
  "8": "end",
  "11": "f1",
  "12": "f2",
  "13": "f3",
  "14": "f4",
  "15": "f5",
  "17": "f6",
  "18": "f7",
  "19": "f8",
  "20": "f9",
  "21": "f10",
  "23": "f11",
  "24": "f12",
});

const PASTE_MARKERS: ReadonlySet<string> = new Set(["200", "201"]);

/** xterm modifier parameter: 1 + (shift | alt << 1 | ctrl << 2). */
function modsFromParam(param: string | undefined): KeyModifiers {
  const n = param === undefined ? 1 : Number.parseInt(param, 10);
  const bits = Number.isFinite(n) && n > 1 ? n - 1 : 0;
  return { shift: (bits & 1) !== 0, alt: (bits & 2) !== 0, ctrl: (bits & 4) !== 0 };
}

function isCsiFinal(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

/** One code point outside an escape sequence, or null for ignored controls. */
function decodeChar(ch: string, alt: boolean, sequence: string): KeyEvent | null {
  const code = ch.codePointAt(0) ?? 0;
  switch (ch) {
    case "\r":
    case "\n":
      return keyEvent("enter", { alt }, sequence);
    case "\t":
      return keyEvent("tab", { alt }, sequence);
    case "\x7f":
    case "\b":
      return keyEvent("backspace", { alt }, sequence);
    case " ":
      return keyEvent("space", { alt }, sequence);
    case "\x00":
      return keyEvent("space", { ctrl: true, alt }, sequence);
  }
  if (code >= 1 && code <= 26) {
    return keyEvent(String.fromCharCode(code + 96), { ctrl: true, alt }, sequence);
  }
  if (code < 0x20) return null;
  if (ch >= "A" && ch <= "Z") {
    return keyEvent(ch.toLowerCase(), { shift: true, alt }, sequence);
  }
  return keyEvent(ch, { alt }, sequence);
}

type Decoded = Readonly<{ event: KeyEvent | null; length: number }>;

function decodeCsi(data: string, start: number): Decoded | null {
  // start points at the "[" after ESC
  let i = start + 1;
  while (i < data.length && !isCsiFinal(data.charCodeAt(i))) i++;
  if (i >= data.length) return null;
  const final = data.charAt(i);
  const params = data.slice(start + 1, i).split(";");
  const sequence = data.slice(start - 1, i + 1);
  const length = i + 1 - (start - 1);

  if (final === "Z") return { event: keyEvent("tab", { shift: true }, sequence), length };
  if (final === "~") {
    const first = params[0] ?? "";
    if (PASTE_MARKERS.has(first)) return { event: null, length };
    const name = CSI_TILDE_KEYS[first];
    return { event: name === undefined ? null : keyEvent(name, modsFromParam(params[1]), sequence), length };
  }
  const name = CSI_LETTER_KEYS[final];
  return { event: name === undefined ? null : keyEvent(name, modsFromParam(params[1]), sequence), length };
}

function decodeSs3(data: string, start: number): Decoded | null {
  // start points at the "O" after ESC
  const final = data.charAt(start + 1);
  if (final === "") return null;
  const name = CSI_LETTER_KEYS[final];
  const sequence = data.slice(start - 1, start + 2);
  return { event: name === undefined ? null : keyEvent(name, {}, sequence), length: 3 };
}

export function decodeKeys(data: string): KeyEvent[] {
  const out: KeyEvent[] = [];
  let i = 0;
  while (i < data.length) {
    const ch = String.fromCodePoint(data.codePointAt(i) ?? 0);
    if (ch !== "\x1b") {
      const ev = decodeChar(ch, false, ch);
      if (ev !== null) out.push(ev);
      i += ch.length;
      continue;
    }

    const next = data.charAt(i + 1);
    let decoded: Decoded | null = null;
    if (next === "[") decoded = decodeCsi(data, i + 1);
    else if (next === "O") decoded = decodeSs3(data, i + 1);

    if (decoded !== null) {
      if (decoded.event !== null) out.push(decoded.event);
      i += decoded.length;
      continue;
    }

    if (next === "" || next === "\x1b" || next === "[" || next === "O") {
      out.push(keyEvent("escape", {}, "\x1b"));
      i += 1;
      continue;
    }

    // ESC followed by a key is alt+key
    const inner = String.fromCodePoint(data.codePointAt(i + 1) ?? 0);
    const ev = decodeChar(inner, true, `\x1b${inner}`);
    if (ev !== null) out.push(ev);
    i += 1 + inner.length;
  }
  return out;
}

/**
 * Split off an escape sequence cut short at the end of `data` (ESC [ with
 * parameters but no final byte, or a bare ESC O) so a reader can join it to
 * the next chunk. A lone trailing ESC is complete: it is the Escape key.
 */
export function splitIncompleteEscape(data: string): Readonly<{ complete: string; rest: string }> {
  const at = data.lastIndexOf("\x1b");
  const whole = { complete: data, rest: "" };
  if (at < 0 || at === data.length - 1) return whole;
  const cut = { complete: data.slice(0, at), rest: data.slice(at) };
  const intro = data.charAt(at + 1);
  if (intro === "O") return at + 2 === data.length ? cut : whole;
  if (intro !== "[") return whole;
  for (let i = at + 2; i < data.length; i++) {
    if (isCsiFinal(data.charCodeAt(i))) return whole;
  }
  return cut;
}

/** Text a key inserts into an editor, or null for commands and controls. */
export function printableText(key: KeyEvent): string | null {
  if (key.ctrl || key.alt) return null;
  if (key.name === "space") return " ";
  if (key.sequence.length === 0 || key.sequence.startsWith("\x1b")) return null;
  const code = key.sequence.codePointAt(0) ?? 0;
  if (code < 0x20 || code === 0x7f) return null;
  return key.sequence;
}
