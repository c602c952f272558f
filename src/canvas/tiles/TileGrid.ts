import type { GridSpec, PanelSize, TileRect } from "../../types";
import { IndexOutOfRangeError, InvalidGridSpecError } from "../../deck/DeckErrors";

/** Number of keys in the grid. */
export function tileCount(spec: GridSpec): number {
  return spec.rows * spec.cols;
}

/**
 * Full panel size in pixels: every key plus the bezel gaps between them.
 * No outer margin is included.
 */
export function panelSize(spec: GridSpec): PanelSize {
  return {
    width: spec.cols * spec.tileWidth + (spec.cols - 1) * spec.spacingX,
    height: spec.rows * spec.tileHeight + (spec.rows - 1) * spec.spacingY,
  };
}

/** Convert a key index to its grid cell. */
export function tileCell(spec: GridSpec, index: number): { row: number; col: number } {
  assertTileIndex(spec, index);
  return {
    row: Math.floor(index / spec.cols),
    col: index % spec.cols,
  };
}

/** Get the panel-space rectangle covered by a key. */
export function tileRect(spec: GridSpec, index: number): TileRect {
  const { row, col } = tileCell(spec, index);
  const x0 = col * (spec.tileWidth + spec.spacingX);
  const y0 = row * (spec.tileHeight + spec.spacingY);
  return {
    x0,
    y0,
    x1: x0 + spec.tileWidth,
    y1: y0 + spec.tileHeight,
  };
}

export function assertTileIndex(spec: GridSpec, index: number): void {
  const count = tileCount(spec);
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new IndexOutOfRangeError(index, count);
  }
}

/**
 * Reject grids that cannot produce a panel image.
 * Rows, columns and key sizes must be positive integers, spacing non-negative.
 */
export function validateGridSpec(spec: GridSpec): GridSpec {
  const positive: (keyof GridSpec)[] = ["rows", "cols", "tileWidth", "tileHeight"];
  for (const field of positive) {
    const value = spec[field];
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidGridSpecError(`${field} must be a positive integer, got ${value}`);
    }
  }
  for (const field of ["spacingX", "spacingY"] as const) {
    const value = spec[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidGridSpecError(`${field} must be a non-negative integer, got ${value}`);
    }
  }
  return spec;
}
