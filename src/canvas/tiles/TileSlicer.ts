import { createCanvas } from "@napi-rs/canvas";
import type { Canvas } from "@napi-rs/canvas";
import type { GridSpec } from "../../types";
import { tileCount, tileRect } from "./TileGrid";

/** Fill for any part of a key that falls outside the panel image. */
export const SLICE_PAD_COLOR = "#000000";

/**
 * Crop one key out of a full-panel image.
 *
 * The crop is copied 1:1 onto a fresh key-sized canvas. If the panel is
 * smaller than the rectangle (rounding), the missing area stays padded with
 * SLICE_PAD_COLOR; the crop is never stretched.
 */
export function sliceTile(panel: Canvas, spec: GridSpec, index: number): Canvas {
  const rect = tileRect(spec, index);
  const tile = createCanvas(spec.tileWidth, spec.tileHeight);
  const ctx = tile.getContext("2d");
  ctx.fillStyle = SLICE_PAD_COLOR;
  ctx.fillRect(0, 0, spec.tileWidth, spec.tileHeight);

  const width = Math.min(rect.x1, panel.width) - rect.x0;
  const height = Math.min(rect.y1, panel.height) - rect.y0;
  if (width > 0 && height > 0) {
    ctx.imageSmoothingEnabled = false;
    ctx.drawImage(panel, rect.x0, rect.y0, width, height, 0, 0, width, height);
  }
  return tile;
}

/** Slice every key of the grid. */
export function sliceAll(panel: Canvas, spec: GridSpec): Map<number, Canvas> {
  const tiles = new Map<number, Canvas>();
  for (let i = 0; i < tileCount(spec); i++) {
    tiles.set(i, sliceTile(panel, spec, i));
  }
  return tiles;
}
