/**
 * packages/core/src/terminal/ansi.ts — ANSI escape sequence builders.
 *
 * Coordinates passed in are 0-based cells; CSI cursor positions are 1-based.
 */

import { type Rgb24, rgbB, rgbG, rgbR } from "../theme/color.js";

export const ESC = "\x1b";
export const CSI = "\x1b[";

export const ENTER_ALT_SCREEN = "\x1b[?1049h";
export const EXIT_ALT_SCREEN = "\x1b[?1049l";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";
export const CLEAR_SCREEN = "\x1b[2J";
export const RESET_SGR = "\x1b[0m";
export const BEGIN_SYNCHRONIZED_UPDATE = "\x1b[?2026h";
export const END_SYNCHRONIZED_UPDATE = "\x1b[?2026l";
export const ENABLE_BRACKETED_PASTE = "\x1b[?2004h";
export const DISABLE_BRACKETED_PASTE = "\x1b[?2004l";

export function cursorTo(x: number, y: number): string {
  return `${CSI}${String(y + 1)};${String(x + 1)}H`;
}

function truecolorParams(selector: 38 | 48, color: Rgb24): string {
  return `${String(selector)};2;${String(rgbR(color))};${String(rgbG(color))};${String(rgbB(color))}`;
}

/**
 * SGR sequence switching only the channels that changed.
 * Returns "" when neither channel changed.
 */
export function sgrColors(
  fg: Rgb24,
  bg: Rgb24,
  lastFg: Rgb24 | null,
  lastBg: Rgb24 | null,
): string {
  const params: string[] = [];
  if (fg !== lastFg) params.push(truecolorParams(38, fg));
  if (bg !== lastBg) params.push(truecolorParams(48, bg));
  if (params.length === 0) return "";
  return `${CSI}${params.join(";")}m`;
}

/** Terminal modes entered on start and left on stop. */
export const TERMINAL_SETUP = `${ENTER_ALT_SCREEN}${HIDE_CURSOR}${ENABLE_BRACKETED_PASTE}${CLEAR_SCREEN}`;
export const TERMINAL_RESTORE = `${RESET_SGR}${DISABLE_BRACKETED_PASTE}${SHOW_CURSOR}${EXIT_ALT_SCREEN}`;
