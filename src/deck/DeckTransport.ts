import type { ButtonState } from "../types";
import type { KeyImageFormat } from "../canvas/NativeImage";

export type KeyCallback = (key: number, pressed: boolean) => void;

/**
 * Device connection for a grid of image keys.
 * Failing operations reject with TransportError.
 */
export interface DeckTransport {
  open(): Promise<void>;
  close(): Promise<void>;
  isOpen(): boolean;

  keyCount(): number;
  /** [rows, cols] */
  keyLayout(): [number, number];
  keyImageFormat(): KeyImageFormat;

  setBrightness(percent: number): Promise<void>;
  /** The callback runs on the transport's own read loop and must return quickly. */
  setKeyCallback(callback: KeyCallback | null): void;
  setKeyImage(key: number, image: Buffer): Promise<void>;

  // Diagnostics only
  deckType(): string;
  getSerialNumber(): Promise<string>;
  getFirmwareVersion(): Promise<string>;
}

/** Read-only view of the button configuration. */
export interface DeckConfigView {
  readonly remoteConnected: boolean;
  /** Indexed by key; a missing or null entry is an empty key. */
  readonly buttons: ReadonlyArray<ButtonState | null | undefined>;
}

/** Receives key press and release notifications. */
export interface OutputPublisher {
  sendButtonSelected(key: number, selected: boolean): void | Promise<void>;
}
