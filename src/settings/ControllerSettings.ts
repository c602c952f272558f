import { readFile } from "fs/promises";
import { GlobalFonts } from "@napi-rs/canvas";

export interface ControllerSettings {
  // Layout
  keySpacing: [number, number];  // Bezel pixels between keys [x, y]

  // Colors
  foregroundColor: string;       // Icon color
  backgroundColor: string;       // Fill behind the background image
  activeColor: string;           // Key background when selected
  notActiveColor: string;        // Key background when not selected, and empty keys

  // Assets
  assetsPath: string;
  backgroundImage: string;       // File name under assetsPath

  // Device
  brightness: number;            // Percent

  // Key rendering
  iconSize: number;
  labelMargin: number;           // Bottom pixels reserved for the label row
  labelBaselineOffset: number;
  labelFontFamily: string;
  labelFontSize: number;
  labelColor: string;
  fontFile: string;              // Optional font file registered as labelFontFamily ("" = system fonts)

  // Cache
  renderCacheCapacity: number;   // 0 = unbounded
}

export const DEFAULT_CONTROLLER_SETTINGS: ControllerSettings = {
  keySpacing: [36, 36],
  foregroundColor: "#FFFFFF",
  backgroundColor: "#9D2235",
  activeColor: "#9D2235",
  notActiveColor: "#424242",
  assetsPath: "assets",
  backgroundImage: "background.png",
  brightness: 80,
  iconSize: 48,
  labelMargin: 20,
  labelBaselineOffset: 5,
  labelFontFamily: "Arial",
  labelFontSize: 14,
  labelColor: "white",
  fontFile: "",
  renderCacheCapacity: 0,
};

type StringSettingKey = { [K in keyof ControllerSettings]: ControllerSettings[K] extends string ? K : never }[keyof ControllerSettings];
type NumberSettingKey = { [K in keyof ControllerSettings]: ControllerSettings[K] extends number ? K : never }[keyof ControllerSettings];

function warnInvalid(key: string, value: unknown): void {
  console.warn(`[ControllerSettings] Ignoring invalid ${key}: ${JSON.stringify(value)}`);
}

function readString(loaded: Record<string, unknown>, key: StringSettingKey): string {
  const value = loaded[key];
  if (value === undefined) return DEFAULT_CONTROLLER_SETTINGS[key];
  if (typeof value === "string") return value;
  warnInvalid(key, value);
  return DEFAULT_CONTROLLER_SETTINGS[key];
}

function readNumber(loaded: Record<string, unknown>, key: NumberSettingKey, min: number, max = Infinity): number {
  const value = loaded[key];
  if (value === undefined) return DEFAULT_CONTROLLER_SETTINGS[key];
  if (typeof value === "number" && Number.isFinite(value)) return Math.min(max, Math.max(min, value));
  warnInvalid(key, value);
  return DEFAULT_CONTROLLER_SETTINGS[key];
}

function readSpacing(loaded: Record<string, unknown>): [number, number] {
  const value = loaded.keySpacing;
  const [dx, dy] = DEFAULT_CONTROLLER_SETTINGS.keySpacing;
  if (value === undefined) return [dx, dy];
  if (
    Array.isArray(value)
    && value.length === 2
    && typeof value[0] === "number" && Number.isInteger(value[0]) && value[0] >= 0
    && typeof value[1] === "number" && Number.isInteger(value[1]) && value[1] >= 0
  ) {
    return [value[0], value[1]];
  }
  warnInvalid("keySpacing", value);
  return [dx, dy];
}

/**
 * Overlay loaded values on the defaults.
 * Unknown keys are ignored; values of the wrong type fall back to the default.
 */
export function mergeSettings(loaded: Record<string, unknown> | null): ControllerSettings {
  const src: Record<string, unknown> = loaded ?? {};
  return {
    keySpacing: readSpacing(src),
    foregroundColor: readString(src, "foregroundColor"),
    backgroundColor: readString(src, "backgroundColor"),
    activeColor: readString(src, "activeColor"),
    notActiveColor: readString(src, "notActiveColor"),
    assetsPath: readString(src, "assetsPath"),
    backgroundImage: readString(src, "backgroundImage"),
    brightness: readNumber(src, "brightness", 0, 100),
    iconSize: readNumber(src, "iconSize", 1),
    labelMargin: readNumber(src, "labelMargin", 0),
    labelBaselineOffset: readNumber(src, "labelBaselineOffset", 0),
    labelFontFamily: readString(src, "labelFontFamily"),
    labelFontSize: readNumber(src, "labelFontSize", 1),
    labelColor: readString(src, "labelColor"),
    fontFile: readString(src, "fontFile"),
    renderCacheCapacity: Math.floor(readNumber(src, "renderCacheCapacity", 0)),
  };
}

/**
 * Load settings from a JSON file. A missing or malformed file yields the defaults.
 */
export async function loadControllerSettings(filePath: string): Promise<ControllerSettings> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (e) {
    console.warn(`[ControllerSettings] Could not read ${filePath}, using defaults:`, e instanceof Error ? e.message : e);
    return mergeSettings(null);
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      console.warn(`[ControllerSettings] ${filePath} is not a JSON object, using defaults`);
      return mergeSettings(null);
    }
    return mergeSettings(Object.fromEntries(Object.entries(parsed)));
  } catch (e) {
    console.warn(`[ControllerSettings] Could not parse ${filePath}, using defaults:`, e instanceof Error ? e.message : e);
    return mergeSettings(null);
  }
}

export function labelFont(settings: ControllerSettings): string {
  return `${settings.labelFontSize}px ${settings.labelFontFamily}`;
}

/** Register the configured font file, if any. Returns false when registration failed. */
export function registerLabelFont(settings: ControllerSettings): boolean {
  if (settings.fontFile === "") return true;
  const ok = GlobalFonts.registerFromPath(settings.fontFile, settings.labelFontFamily) !== null;
  if (!ok) {
    console.warn(`[ControllerSettings] Failed to register font ${settings.fontFile}`);
  }
  return ok;
}
