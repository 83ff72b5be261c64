/**
 * packages/core/src/theme/defaultTheme.ts — Default theme values.
 *
 * Kept separate from theme helpers to avoid accidental circular imports.
 */

import { rgb } from "./color.js";
import type { Theme } from "./types.js";

export const defaultTheme: Theme = Object.freeze({
  colors: Object.freeze({
    bg: rgb(30, 30, 30),
    fg: rgb(230, 230, 230),
    primary: rgb(0, 120, 215),
    muted: rgb(128, 128, 128),
    border: rgb(90, 90, 90),
    focus: rgb(255, 193, 7),
    selection: rgb(0, 84, 153),
    success: rgb(40, 167, 69),
    warning: rgb(255, 193, 7),
    danger: rgb(220, 53, 69),
    info: rgb(23, 162, 184),
    surface: rgb(45, 45, 48),
  }),
});
