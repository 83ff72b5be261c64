/**
 * packages/core/src/theme/theme.ts — Theme helpers.
 */

import type { Rgb24 } from "./color.js";
import { defaultTheme } from "./defaultTheme.js";
import type { Theme, ThemeColorName, ThemeColors } from "./types.js";
export type { Theme, ThemeColorName, ThemeColors } from "./types.js";

export function createTheme(overrides: Readonly<{ colors?: Partial<ThemeColors> }>): Theme {
  const colors: ThemeColors = Object.freeze({ ...defaultTheme.colors, ...(overrides.colors ?? {}) });
  return Object.freeze({ colors });
}

export function resolveColor(theme: Theme, color: ThemeColorName | Rgb24): Rgb24 {
  if (typeof color === "number") return color;
  return theme.colors[color];
}
