export * from "./types";
export * from "./deck/DeckErrors";
export type { DeckTransport, DeckConfigView, OutputPublisher, KeyCallback } from "./deck/DeckTransport";
export { DeckController } from "./deck/DeckController";
export { createDeckSession, gridSpecFromDeck } from "./deck/DeckSession";
export type { DeckSession } from "./deck/DeckSession";
export { WriteSuppressor } from "./deck/WriteSuppressor";
export type { KeyWriter } from "./deck/WriteSuppressor";
export { KeyEventChannel } from "./deck/KeyEventChannel";
export type { KeyEvent } from "./deck/KeyEventChannel";
export { SerialQueue } from "./deck/SerialQueue";

export { FileAssetLoader } from "./canvas/AssetLoader";
export type { AssetImage, AssetLoader } from "./canvas/AssetLoader";
export { composePanel, fitImage } from "./canvas/PanelComposer";
export { NativeImageEncoder, orientKeyImage, toNativeKeyFormat } from "./canvas/NativeImage";
export type { KeyImageFormat, KeyImageEncoding, KeyRotation } from "./canvas/NativeImage";
export { panelSize, tileRect, tileCell, tileCount, validateGridSpec } from "./canvas/tiles/TileGrid";
export { sliceTile, sliceAll } from "./canvas/tiles/TileSlicer";
export { TileCache, renderKeyString } from "./canvas/tiles/TileCache";
export { TileRenderer, recolorIcon } from "./canvas/tiles/TileRenderer";
export type { TileRenderOptions } from "./canvas/tiles/TileRenderer";

export {
  DEFAULT_CONTROLLER_SETTINGS,
  labelFont,
  loadControllerSettings,
  mergeSettings,
  registerLabelFont,
} from "./settings/ControllerSettings";
export type { ControllerSettings } from "./settings/ControllerSettings";
