import { createCanvas } from "@napi-rs/canvas";
import type { Canvas } from "@napi-rs/canvas";
import type { GridSpec } from "../types";
import type { AssetImage, AssetLoader } from "./AssetLoader";
import { panelSize, validateGridSpec } from "./tiles/TileGrid";
import { InvalidGridSpecError } from "../deck/DeckErrors";

/**
 * Scale `source` to exactly `width` x `height`, preserving aspect ratio.
 * Excess is cropped equally from both sides of the longer axis.
 */
export function fitImage(source: AssetImage, width: number, height: number): Canvas {
  const sourceRatio = source.width / source.height;
  const outputRatio = width / height;

  let cropWidth = source.width;
  let cropHeight = source.height;
  if (sourceRatio > outputRatio) {
    cropWidth = outputRatio * source.height;
  } else if (sourceRatio < outputRatio) {
    cropHeight = source.width / outputRatio;
  }
  const cropLeft = (source.width - cropWidth) / 2;
  const cropTop = (source.height - cropHeight) / 2;

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = "high";
  ctx.drawImage(source, cropLeft, cropTop, cropWidth, cropHeight, 0, 0, width, height);
  return canvas;
}

/**
 * Build an image covering the whole panel (all keys plus the bezels between
 * them) from a single asset.
 *
 * The asset is pasted top-aligned and horizontally centered onto a
 * background-filled canvas with the panel's aspect ratio, then resampled to
 * the exact panel size.
 */
export async function composePanel(
  assets: AssetLoader,
  fileName: string,
  spec: GridSpec,
  backgroundColor: string,
): Promise<Canvas> {
  const size = panelSize(validateGridSpec(spec));
  if (size.width <= 0 || size.height <= 0) {
    throw new InvalidGridSpecError(`Panel size ${size.width}x${size.height} has a zero dimension`);
  }

  const foreground = await assets.loadImage(fileName);

  const fillWidth = Math.max(1, Math.floor(foreground.height * size.width / size.height));
  const fillHeight = Math.max(1, foreground.height);
  const filled = createCanvas(fillWidth, fillHeight);
  const ctx = filled.getContext("2d");
  ctx.fillStyle = backgroundColor;
  ctx.fillRect(0, 0, fillWidth, fillHeight);
  ctx.drawImage(foreground, Math.floor((fillWidth - foreground.width) / 2), 0);

  return fitImage(filled, size.width, size.height);
}
