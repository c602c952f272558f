export type DeckErrorKind =
  | "AssetNotFound"
  | "IconAssetNotFound"
  | "IndexOutOfRange"
  | "InvalidGridSpec"
  | "Transport";

/** Base class for every failure raised by key rendering or the deck session. */
export class DeckError extends Error {
  readonly kind: DeckErrorKind;

  constructor(kind: DeckErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** A source image could not be read or decoded. */
export class AssetNotFoundError extends DeckError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }, kind: DeckErrorKind = "AssetNotFound") {
    super(kind, `Asset not found or unreadable: ${path}`, options);
    this.path = path;
  }
}

/** A configured button names an icon whose asset could not be loaded. */
export class IconAssetNotFoundError extends AssetNotFoundError {
  readonly icon: string;

  constructor(icon: string, path: string, options?: { cause?: unknown }) {
    super(path, options, "IconAssetNotFound");
    this.icon = icon;
  }
}

export class IndexOutOfRangeError extends DeckError {
  readonly index: number;

  constructor(index: number, count: number) {
    super("IndexOutOfRange", `Key index ${index} is outside [0, ${count})`);
    this.index = index;
  }
}

export class InvalidGridSpecError extends DeckError {
  constructor(message: string) {
    super("InvalidGridSpec", message);
  }
}

/** Raised by transports for open, close, brightness and image write failures. */
export class TransportError extends DeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Transport", message, options);
  }
}
