/**
 * packages/core/src/layout/gridPanel.ts — Track-based grid layout.
 *
 * Row and column tracks are either fixed(n) or weighted(w); see
 * resolveTrackSizes() for how the free extent is split. A child sits at the
 * row/column assigned with place(); out-of-range indices clamp to the last
 * track and spans clamp to the grid edge.
 */

import { invalidProps } from "../errors.js";
import type { UiNode } from "../tree/node.js";
import { Panel, type PanelProps } from "./panel.js";
import { type Track, resolveTrackSizes, trackOffsets, weighted } from "./tracks.js";

export type GridPlacement = Readonly<{
  row: number;
  column: number;
  rowSpan: number;
  columnSpan: number;
}>;

export type GridPanelProps = PanelProps &
  Readonly<{
    rows?: readonly Track[];
    columns?: readonly Track[];
    gap?: number;
  }>;

const DEFAULT_PLACEMENT: GridPlacement = Object.freeze({ row: 0, column: 0, rowSpan: 1, columnSpan: 1 });
const SINGLE_TRACK: readonly Track[] = Object.freeze([weighted(1)]);

function requireIndex(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

function requireSpan(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 1) invalidProps(`${name} must be a positive integer`);
  return v;
}

function spanExtent(sizes: readonly number[], start: number, span: number, gap: number): number {
  let total = 0;
  for (let i = start; i < start + span; i++) total += sizes[i] ?? 0;
  return total + Math.max(0, span - 1) * gap;
}

export class GridPanel extends Panel {
  rows: readonly Track[];
  columns: readonly Track[];
  gap: number;
  private readonly placements = new Map<UiNode, GridPlacement>();

  constructor(props: GridPanelProps = {}) {
    super(props);
    this.rows = props.rows !== undefined && props.rows.length > 0 ? props.rows : SINGLE_TRACK;
    this.columns =
      props.columns !== undefined && props.columns.length > 0 ? props.columns : SINGLE_TRACK;
    this.gap = Math.max(0, Math.floor(props.gap ?? 0));
  }

  /** Add (or re-place) a child at a grid cell. */
  place<T extends UiNode>(child: T, row: number, column: number, rowSpan = 1, columnSpan = 1): T {
    const placement: GridPlacement = Object.freeze({
      row: requireIndex("row", row),
      column: requireIndex("column", column),
      rowSpan: requireSpan("rowSpan", rowSpan),
      columnSpan: requireSpan("columnSpan", columnSpan),
    });
    if (child.parent !== this) this.addChild(child);
    this.placements.set(child, placement);
    return child;
  }

  override removeChild(child: UiNode): boolean {
    this.placements.delete(child);
    return super.removeChild(child);
  }

  override clearChildren(): void {
    this.placements.clear();
    super.clearChildren();
  }

  placementOf(child: UiNode): GridPlacement {
    return this.placements.get(child) ?? DEFAULT_PLACEMENT;
  }

  /** Resolved [columnWidths, rowHeights] for the current content rect. */
  resolveTracks(): Readonly<{ columnWidths: number[]; rowHeights: number[] }> {
    const content = this.contentRect;
    return Object.freeze({
      columnWidths: resolveTrackSizes(content.w, this.columns, this.gap),
      rowHeights: resolveTrackSizes(content.h, this.rows, this.gap),
    });
  }

  override arrange(): void {
    const content = this.contentRect;
    const { columnWidths, rowHeights } = this.resolveTracks();
    const columnStarts = trackOffsets(columnWidths, this.gap);
    const rowStarts = trackOffsets(rowHeights, this.gap);
    const lastColumn = columnWidths.length - 1;
    const lastRow = rowHeights.length - 1;

    for (const child of this.children) {
      if (!child.visible) continue;
      const p = this.placementOf(child);
      const column = Math.min(p.column, lastColumn);
      const row = Math.min(p.row, lastRow);
      const columnSpan = Math.min(p.columnSpan, lastColumn - column + 1);
      const rowSpan = Math.min(p.rowSpan, lastRow - row + 1);
      child.setBounds({
        x: content.x + (columnStarts[column] ?? 0),
        y: content.y + (rowStarts[row] ?? 0),
        w: spanExtent(columnWidths, column, columnSpan, this.gap),
        h: spanExtent(rowHeights, row, rowSpan, this.gap),
      });
    }
  }
}
