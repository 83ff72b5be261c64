/**
 * packages/core/src/theme/types.ts — Theme type definitions.
 */

import type { Rgb24 } from "./color.js";

/** Named palette slots widgets draw with. */
export type ThemeColorName =
  | "bg"
  | "fg"
  | "primary"
  | "muted"
  | "border"
  | "focus"
  | "selection"
  | "success"
  | "warning"
  | "danger"
  | "info"
  | "surface";

export type ThemeColors = Readonly<Record<ThemeColorName, Rgb24>>;

export type Theme = Readonly<{
  colors: ThemeColors;
}>;
