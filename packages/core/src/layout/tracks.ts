/**
 * packages/core/src/layout/tracks.ts — Grid track definitions and sizing.
 */

import { invalidProps } from "../errors.js";
import { distributeInteger } from "./engine/distributeInteger.js";

export type Track =
  | Readonly<{ kind: "fixed"; size: number }>
  | Readonly<{ kind: "weighted"; weight: number }>;

export function fixed(size: number): Track {
  if (!Number.isInteger(size) || size < 0) invalidProps("fixed track size must be a non-negative integer");
  return Object.freeze({ kind: "fixed", size });
}

export function weighted(weight = 1): Track {
  if (!Number.isFinite(weight) || weight <= 0) invalidProps("track weight must be a positive number");
  return Object.freeze({ kind: "weighted", weight });
}

/**
 * Resolve track sizes along one axis.
 *
 * Fixed tracks keep their size; the extent left after fixed tracks and gaps
 * is split among weighted tracks by weight (floor division, remainder to the
 * last weighted track). Weighted tracks get 0 when nothing is left.
 */
export function resolveTrackSizes(extent: number, tracks: readonly Track[], gap = 0): number[] {
  const sizes = new Array<number>(tracks.length).fill(0);
  const weights = new Array<number>(tracks.length).fill(0);
  let fixedTotal = 0;
  for (let i = 0; i < tracks.length; i++) {
    const track = tracks[i];
    if (track === undefined) continue;
    if (track.kind === "fixed") {
      sizes[i] = track.size;
      fixedTotal += track.size;
    } else {
      weights[i] = track.weight;
    }
  }

  const gaps = Math.max(0, tracks.length - 1) * Math.max(0, gap);
  const free = Math.max(0, Math.floor(extent) - fixedTotal - gaps);
  const shares = distributeInteger(free, weights);
  for (let i = 0; i < tracks.length; i++) {
    if (tracks[i]?.kind === "weighted") sizes[i] = shares[i] ?? 0;
  }
  return sizes;
}

/** Start offset of each track given resolved sizes. */
export function trackOffsets(sizes: readonly number[], gap = 0): number[] {
  const offsets: number[] = [];
  let cursor = 0;
  for (const size of sizes) {
    offsets.push(cursor);
    cursor += size + Math.max(0, gap);
  }
  return offsets;
}
