/**
 * Shared data model for rendering key images onto a grid of physical keys.
 *
 * Index convention: keys are numbered row-major from the top-left corner,
 * so `index = row * cols + col`.
 */

/** Grid layout and key pixel geometry for one device session. */
export interface GridSpec {
  readonly rows: number;
  readonly cols: number;
  readonly tileWidth: number;   // Pixels per key, horizontally
  readonly tileHeight: number;  // Pixels per key, vertically
  readonly spacingX: number;    // Pixels of bezel between adjacent columns
  readonly spacingY: number;    // Pixels of bezel between adjacent rows
}

export interface PanelSize {
  width: number;
  height: number;
}

/** Key rectangle in panel pixel space. End coordinates are exclusive. */
export interface TileRect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** A configured button, as supplied by the configuration view. */
export interface ButtonState {
  icon: string;     // Icon asset name without extension, "" for none
  label: string;
  selected: boolean;
}

/** Cache identity of a rendered icon+label key. */
export interface RenderKey {
  icon: string;
  label: string;
  background: string;
}

/**
 * What is currently shown on a physical key.
 * "unknown" is the state at session start, before anything was written.
 */
export type WriteTag =
  | { kind: "unknown" }
  | { kind: "background" }
  | { kind: "empty" }
  | { kind: "rendered"; icon: string; label: string; background: string };

export const UNKNOWN_TAG: WriteTag = { kind: "unknown" };
export const BACKGROUND_TAG: WriteTag = { kind: "background" };
export const EMPTY_TAG: WriteTag = { kind: "empty" };

export function renderedTag(key: RenderKey): WriteTag {
  return { kind: "rendered", icon: key.icon, label: key.label, background: key.background };
}

/** Value equality for write tags. "unknown" never equals anything, itself included. */
export function writeTagsEqual(a: WriteTag, b: WriteTag): boolean {
  switch (a.kind) {
    case "unknown":
      return false;
    case "background":
    case "empty":
      return b.kind === a.kind;
    case "rendered":
      return b.kind === "rendered"
        && a.icon === b.icon
        && a.label === b.label
        && a.background === b.background;
  }
}
