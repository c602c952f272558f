import { mkdtemp, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";
import { createCanvas } from "@napi-rs/canvas";
import { FileAssetLoader } from "./AssetLoader";
import { AssetNotFoundError } from "../deck/DeckErrors";

describe("FileAssetLoader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "deck-assets-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("decodes a PNG relative to the assets path", async () => {
    const canvas = createCanvas(12, 8);
    const ctx = canvas.getContext("2d");
    ctx.fillStyle = "#ff0000";
    ctx.fillRect(0, 0, 12, 8);
    await writeFile(path.join(dir, "red.png"), canvas.toBuffer("image/png"));

    const image = await new FileAssetLoader(dir).loadImage("red.png");

    expect(image.width).toBe(12);
    expect(image.height).toBe(8);
  });

  it("resolves file names against the assets path", () => {
    const loader = new FileAssetLoader("/srv/assets");
    expect(loader.resolve("gear.svg")).toBe(path.join("/srv/assets", "gear.svg"));
  });

  it("reports a missing file as AssetNotFoundError", async () => {
    const loader = new FileAssetLoader(dir);
    const missing = path.join(dir, "missing.png");

    await expect(loader.loadImage("missing.png")).rejects.toThrow(AssetNotFoundError);
    await expect(loader.loadImage("missing.png")).rejects.toMatchObject({
      kind: "AssetNotFound",
      path: missing,
    });
  });

  it("reports an undecodable file as AssetNotFoundError", async () => {
    await writeFile(path.join(dir, "broken.png"), "not an image");
    const loader = new FileAssetLoader(dir);

    await expect(loader.loadImage("broken.png")).rejects.toThrow(AssetNotFoundError);
  });
});
