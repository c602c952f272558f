import type { Canvas } from "@napi-rs/canvas";
import type { GridSpec } from "../types";
import type { DeckTransport } from "./DeckTransport";
import type { AssetLoader } from "../canvas/AssetLoader";
import type { ControllerSettings } from "../settings/ControllerSettings";
import { labelFont, registerLabelFont } from "../settings/ControllerSettings";
import type { KeyImageFormat } from "../canvas/NativeImage";
import { NativeImageEncoder } from "../canvas/NativeImage";
import { composePanel } from "../canvas/PanelComposer";
import { sliceAll } from "../canvas/tiles/TileSlicer";
import { TileCache } from "../canvas/tiles/TileCache";
import { TileRenderer } from "../canvas/tiles/TileRenderer";
import { tileCount, validateGridSpec } from "../canvas/tiles/TileGrid";
import { WriteSuppressor } from "./WriteSuppressor";
import { InvalidGridSpecError } from "./DeckErrors";

/**
 * Everything that lives for exactly one open device session.
 * Dropped on close; a reopen starts from a fresh session with unknown key state.
 */
export interface DeckSession {
  grid: GridSpec;
  format: KeyImageFormat;
  /** Precomputed background slices by key index. */
  background: Map<number, Canvas>;
  renderer: TileRenderer;
  encoder: NativeImageEncoder;
  suppressor: WriteSuppressor;
}

/** Derive the grid from what the device reports plus the configured bezel spacing. */
export function gridSpecFromDeck(transport: DeckTransport, settings: ControllerSettings): GridSpec {
  const [rows, cols] = transport.keyLayout();
  const [tileWidth, tileHeight] = transport.keyImageFormat().size;
  const [spacingX, spacingY] = settings.keySpacing;
  const grid = validateGridSpec({ rows, cols, tileWidth, tileHeight, spacingX, spacingY });

  const keyCount = transport.keyCount();
  if (tileCount(grid) !== keyCount) {
    throw new InvalidGridSpecError(`Layout ${rows}x${cols} does not match key count ${keyCount}`);
  }
  return grid;
}

export async function createDeckSession(
  transport: DeckTransport,
  settings: ControllerSettings,
  assets: AssetLoader,
): Promise<DeckSession> {
  const grid = gridSpecFromDeck(transport, settings);
  const format = transport.keyImageFormat();

  const panel = await composePanel(assets, settings.backgroundImage, grid, settings.backgroundColor);
  console.info(`[DeckSession] Created full deck image size of ${panel.width}x${panel.height} pixels.`);

  // A failed registration is logged; labels then fall back to system fonts.
  registerLabelFont(settings);
  const renderer = new TileRenderer(
    {
      tileWidth: grid.tileWidth,
      tileHeight: grid.tileHeight,
      foregroundColor: settings.foregroundColor,
      notActiveColor: settings.notActiveColor,
      iconSize: settings.iconSize,
      labelMargin: settings.labelMargin,
      labelBaselineOffset: settings.labelBaselineOffset,
      labelFont: labelFont(settings),
      labelColor: settings.labelColor,
    },
    assets,
    new TileCache(settings.renderCacheCapacity),
  );

  return {
    grid,
    format,
    background: sliceAll(panel, grid),
    renderer,
    encoder: new NativeImageEncoder(format),
    suppressor: new WriteSuppressor(tileCount(grid)),
  };
}
