/**
 * packages/core/src/theme/color.ts — Packed 24-bit colors.
 */

/** Packed RGB color (0x00RRGGBB). */
export type Rgb24 = number;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

/** Parse "#rrggbb" (or "rrggbb"); null when malformed. */
export function parseHexColor(text: string): Rgb24 | null {
  const hex = text.startsWith("#") ? text.slice(1) : text;
  if (!/^[0-9a-fA-F]{6}$/.test(hex)) return null;
  return Number.parseInt(hex, 16);
}
