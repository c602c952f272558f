import { readFile } from "fs/promises";
import * as path from "path";
import { loadImage } from "@napi-rs/canvas";
import type { Canvas, Image } from "@napi-rs/canvas";
import { AssetNotFoundError } from "../deck/DeckErrors";

/** Anything the 2D context can draw from. */
export type AssetImage = Image | Canvas;

/** Source of decoded image assets, addressed by file name. */
export interface AssetLoader {
  loadImage(fileName: string): Promise<AssetImage>;
}

/**
 * Loads PNG, JPEG and SVG assets from a directory on disk.
 * Any read or decode failure surfaces as AssetNotFoundError.
 */
export class FileAssetLoader implements AssetLoader {
  private assetsPath: string;

  constructor(assetsPath: string) {
    this.assetsPath = assetsPath;
  }

  resolve(fileName: string): string {
    return path.join(this.assetsPath, fileName);
  }

  async loadImage(fileName: string): Promise<AssetImage> {
    const filePath = this.resolve(fileName);
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (e) {
      throw new AssetNotFoundError(filePath, { cause: e });
    }
    try {
      return await loadImage(data);
    } catch (e) {
      throw new AssetNotFoundError(filePath, { cause: e });
    }
  }
}
