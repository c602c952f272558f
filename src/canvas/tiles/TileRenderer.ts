import { createCanvas } from "@napi-rs/canvas";
import type { Canvas } from "@napi-rs/canvas";
import type { RenderKey } from "../../types";
import type { AssetImage, AssetLoader } from "../AssetLoader";
import { AssetNotFoundError, IconAssetNotFoundError } from "../../deck/DeckErrors";
import { TileCache, renderKeyString } from "./TileCache";

export interface TileRenderOptions {
  tileWidth: number;
  tileHeight: number;
  foregroundColor: string;     // Icon recolor target
  notActiveColor: string;      // Fill for keys with no button
  iconSize: number;            // Icon raster size before fitting into the key
  labelMargin: number;         // Pixels reserved at the bottom for the label row
  labelBaselineOffset: number; // Label baseline distance from the bottom edge
  labelFont: string;           // CSS font shorthand
  labelColor: string;
}

/** Rasterize an icon into an `iconSize` box (aspect preserved) and recolor every opaque pixel. */
export function recolorIcon(source: AssetImage, iconSize: number, color: string): Canvas {
  const scale = iconSize / Math.max(source.width, source.height);
  const width = Math.max(1, Math.round(source.width * scale));
  const height = Math.max(1, Math.round(source.height * scale));

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");
  ctx.imageSmoothingQuality = "high";
  ctx.drawImage(source, 0, 0, width, height);

  // source-in keeps the icon's alpha and takes the fill color
  ctx.globalCompositeOperation = "source-in";
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, width, height);
  return canvas;
}

/**
 * Renders icon+label keys on demand, memoized by render key.
 */
export class TileRenderer {
  private options: TileRenderOptions;
  private assets: AssetLoader;
  private cache: TileCache;
  private pending = new Map<string, Promise<Canvas>>();

  constructor(options: TileRenderOptions, assets: AssetLoader, cache: TileCache = new TileCache()) {
    this.options = options;
    this.assets = assets;
    this.cache = cache;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /**
   * Get the image for a key, rendering it on a cache miss.
   * The returned canvas is shared with the cache and must not be drawn into.
   */
  async renderTile(key: RenderKey): Promise<Canvas> {
    const cached = this.cache.get(key);
    if (cached) return cached;

    const keyStr = renderKeyString(key);
    const inFlight = this.pending.get(keyStr);
    if (inFlight) return inFlight;

    const render = this.renderUncached(key)
      .then((image) => {
        this.cache.set(key, image);
        return image;
      })
      .finally(() => {
        this.pending.delete(keyStr);
      });
    this.pending.set(keyStr, render);
    return render;
  }

  /** Plain fill for a key with no configured button. Not cached. */
  renderEmptyTile(): Canvas {
    return this.createTile(this.options.notActiveColor);
  }

  private async renderUncached(key: RenderKey): Promise<Canvas> {
    const image = key.icon !== ""
      ? this.createIconTile(await this.loadIcon(key.icon), key.background)
      : this.createTile(key.background);

    if (key.label !== "") {
      const ctx = image.getContext("2d");
      ctx.font = this.options.labelFont;
      ctx.textAlign = "center";
      ctx.textBaseline = "alphabetic";
      ctx.fillStyle = this.options.labelColor;
      ctx.fillText(key.label, image.width / 2, image.height - this.options.labelBaselineOffset);
    }
    return image;
  }

  private async loadIcon(icon: string): Promise<AssetImage> {
    const fileName = `${icon}.svg`;
    try {
      return await this.assets.loadImage(fileName);
    } catch (e) {
      const path = e instanceof AssetNotFoundError ? e.path : fileName;
      throw new IconAssetNotFoundError(icon, path, { cause: e });
    }
  }

  private createTile(background: string): Canvas {
    const { tileWidth, tileHeight } = this.options;
    const canvas = createCanvas(tileWidth, tileHeight);
    const ctx = canvas.getContext("2d");
    ctx.fillStyle = background;
    ctx.fillRect(0, 0, tileWidth, tileHeight);
    return canvas;
  }

  /**
   * Recolored icon centered in the area above the label row.
   * Icons are shrunk to fit but never enlarged.
   */
  private createIconTile(source: AssetImage, background: string): Canvas {
    const { tileWidth, tileHeight, labelMargin, iconSize, foregroundColor } = this.options;
    const icon = recolorIcon(source, iconSize, foregroundColor);

    const boxWidth = tileWidth;
    const boxHeight = Math.max(1, tileHeight - labelMargin);
    const scale = Math.min(1, boxWidth / icon.width, boxHeight / icon.height);
    const width = Math.max(1, Math.round(icon.width * scale));
    const height = Math.max(1, Math.round(icon.height * scale));

    const canvas = this.createTile(background);
    const ctx = canvas.getContext("2d");
    ctx.imageSmoothingQuality = "high";
    ctx.drawImage(
      icon,
      Math.floor((boxWidth - width) / 2),
      Math.floor((boxHeight - height) / 2),
      width,
      height,
    );
    return canvas;
  }
}
