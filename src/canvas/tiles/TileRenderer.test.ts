import { TileRenderer, recolorIcon } from "./TileRenderer";
import type { TileRenderOptions } from "./TileRenderer";
import { TileCache } from "./TileCache";
import { IconAssetNotFoundError } from "../../deck/DeckErrors";
import { GlobalFonts } from "@napi-rs/canvas";
import { MemoryAssetLoader, TEST_FONT_PATH, canvasBytes, expectPixelNear, iconCanvas, pixelAt } from "../__tests__/pixels";
import type { RenderKey } from "../../types";

const GREEN: [number, number, number, number] = [0, 255, 0, 255];
const MAROON: [number, number, number, number] = [0x9d, 0x22, 0x35, 255];
const GREY: [number, number, number, number] = [0x42, 0x42, 0x42, 255];

function makeOptions(overrides?: Partial<TileRenderOptions>): TileRenderOptions {
  return {
    tileWidth: 72,
    tileHeight: 72,
    foregroundColor: "#00ff00",
    notActiveColor: "#424242",
    iconSize: 48,
    labelMargin: 20,
    labelBaselineOffset: 5,
    labelFont: "14px sans-serif",
    labelColor: "white",
    ...overrides,
  };
}

function makeKey(overrides?: Partial<RenderKey>): RenderKey {
  return { icon: "gear", label: "", background: "#9D2235", ...overrides };
}

function makeAssets(): MemoryAssetLoader {
  return new MemoryAssetLoader().add("gear.svg", iconCanvas(96));
}

describe("recolorIcon", () => {
  it("fits the icon into the icon box and recolors opaque pixels", () => {
    const icon = recolorIcon(iconCanvas(96), 48, "#00ff00");
    expect(icon.width).toBe(48);
    expect(icon.height).toBe(48);
    expectPixelNear(icon, 24, 24, GREEN);
    expect(pixelAt(icon, 0, 0)[3]).toBe(0);
  });
});

describe("TileRenderer", () => {
  describe("renderTile", () => {
    it("draws the recolored icon above the label row on the background", async () => {
      const renderer = new TileRenderer(makeOptions(), makeAssets());
      const tile = await renderer.renderTile(makeKey());

      expect(tile.width).toBe(72);
      expect(tile.height).toBe(72);
      // 48px icon centered in the 72x52 area above the label: disc center at (36, 26)
      expectPixelNear(tile, 36, 26, GREEN);
      expectPixelNear(tile, 1, 1, MAROON);
      expectPixelNear(tile, 36, 62, MAROON);
    });

    it("draws the label centered on its baseline inside the label row", async () => {
      GlobalFonts.registerFromPath(TEST_FONT_PATH, "TileLabelTest");
      const renderer = new TileRenderer(
        makeOptions({ labelFont: "14px TileLabelTest", labelColor: "#ffff00" }),
        makeAssets(),
      );
      const tile = await renderer.renderTile(makeKey({ icon: "", label: "MMM" }));

      // Changed pixels may only be antialiased label edges; lit ones are the glyph bodies.
      const { data } = tile.getContext("2d").getImageData(0, 0, 72, 72);
      let lit = 0;
      let minX = 72, maxX = -1, minY = 72, maxY = -1;
      for (let y = 0; y < 72; y++) {
        for (let x = 0; x < 72; x++) {
          const i = (y * 72 + x) * 4;
          const changed = data[i] !== MAROON[0] || data[i + 1] !== MAROON[1] || data[i + 2] !== MAROON[2];
          if (changed) {
            minY = Math.min(minY, y);
            maxY = Math.max(maxY, y);
          }
          if (data[i] > 200 && data[i + 1] > 200 && data[i + 2] < 100) {
            lit++;
            minX = Math.min(minX, x);
            maxX = Math.max(maxX, x);
          }
        }
      }

      expect(lit).toBeGreaterThan(20);
      // Label row starts at 72 - labelMargin; baseline sits at 72 - labelBaselineOffset.
      expect(minY).toBeGreaterThanOrEqual(52);
      expect(maxY).toBeLessThanOrEqual(68);
      expect(Math.abs((minX + maxX) / 2 - 36)).toBeLessThanOrEqual(3);
    });

    it("renders a plain background when there is no icon", async () => {
      const assets = makeAssets();
      const renderer = new TileRenderer(makeOptions(), assets);
      const tile = await renderer.renderTile(makeKey({ icon: "" }));

      expectPixelNear(tile, 36, 26, MAROON);
      expect(assets.loadCount("gear.svg")).toBe(0);
    });

    it("returns the cached image for an identical key without reloading", async () => {
      const assets = makeAssets();
      const renderer = new TileRenderer(makeOptions(), assets);

      const first = await renderer.renderTile(makeKey({ label: "On" }));
      const second = await renderer.renderTile(makeKey({ label: "On" }));

      expect(second).toBe(first);
      expect(assets.loadCount("gear.svg")).toBe(1);
      expect(renderer.cacheSize).toBe(1);
    });

    it("renders pixel-identical output for equal keys in separate caches", async () => {
      const a = await new TileRenderer(makeOptions(), makeAssets()).renderTile(makeKey({ label: "On" }));
      const b = await new TileRenderer(makeOptions(), makeAssets()).renderTile(makeKey({ label: "On" }));
      expect(Buffer.from(canvasBytes(a)).equals(Buffer.from(canvasBytes(b)))).toBe(true);
    });

    it("shares one render between concurrent requests for the same key", async () => {
      const assets = makeAssets();
      const renderer = new TileRenderer(makeOptions(), assets);

      const [a, b] = await Promise.all([
        renderer.renderTile(makeKey()),
        renderer.renderTile(makeKey()),
      ]);

      expect(a).toBe(b);
      expect(assets.loadCount("gear.svg")).toBe(1);
    });

    it("keeps one entry per background color", async () => {
      const renderer = new TileRenderer(makeOptions(), makeAssets());
      await renderer.renderTile(makeKey({ background: "#9D2235" }));
      await renderer.renderTile(makeKey({ background: "#424242" }));
      expect(renderer.cacheSize).toBe(2);
    });

    it("respects the cache capacity it is given", async () => {
      const assets = makeAssets();
      const renderer = new TileRenderer(makeOptions(), assets, new TileCache(1));
      await renderer.renderTile(makeKey({ label: "a" }));
      await renderer.renderTile(makeKey({ label: "b" }));
      await renderer.renderTile(makeKey({ label: "a" }));

      expect(renderer.cacheSize).toBe(1);
      expect(assets.loadCount("gear.svg")).toBe(3);
    });

    it("reports a missing icon and caches nothing", async () => {
      const renderer = new TileRenderer(makeOptions(), new MemoryAssetLoader());

      await expect(renderer.renderTile(makeKey({ icon: "missing" }))).rejects.toThrow(IconAssetNotFoundError);
      await expect(renderer.renderTile(makeKey({ icon: "missing" }))).rejects.toMatchObject({
        kind: "IconAssetNotFound",
        icon: "missing",
        path: "missing.svg",
      });
      expect(renderer.cacheSize).toBe(0);
    });
  });

  describe("renderEmptyTile", () => {
    it("fills the key with the not-active color", () => {
      const renderer = new TileRenderer(makeOptions(), makeAssets());
      const tile = renderer.renderEmptyTile();
      expect(tile.width).toBe(72);
      expect(pixelAt(tile, 0, 0)).toEqual(GREY);
      expect(pixelAt(tile, 71, 71)).toEqual(GREY);
    });

    it("does not touch the cache", () => {
      const renderer = new TileRenderer(makeOptions(), makeAssets());
      renderer.renderEmptyTile();
      expect(renderer.cacheSize).toBe(0);
    });
  });
});
