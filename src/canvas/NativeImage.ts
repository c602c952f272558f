import { createCanvas } from "@napi-rs/canvas";
import type { Canvas } from "@napi-rs/canvas";

export type KeyImageEncoding = "JPEG" | "PNG";
export type KeyRotation = 0 | 90 | 180 | 270;

/** Image format a device expects for its keys. */
export interface KeyImageFormat {
  size: [number, number];
  format: KeyImageEncoding;
  flip: [boolean, boolean];   // [horizontal, vertical], applied after rotation
  rotation: KeyRotation;      // Degrees counter-clockwise
}

export const JPEG_QUALITY = 100;

// 2x2 linear part of the counter-clockwise rotation, in y-down pixel space
const ROTATIONS: Record<KeyRotation, [number, number, number, number]> = {
  0: [1, 0, 0, 1],
  90: [0, -1, 1, 0],
  180: [-1, 0, 0, -1],
  270: [0, 1, -1, 0],
};

/**
 * Rotate and mirror a key image into the device's orientation, scaling it to
 * the device key size if needed.
 */
export function orientKeyImage(image: Canvas, format: KeyImageFormat): Canvas {
  const [width, height] = format.size;
  const quarterTurn = format.rotation === 90 || format.rotation === 270;
  const drawWidth = quarterTurn ? height : width;
  const drawHeight = quarterTurn ? width : height;

  const [a, b, c, d] = ROTATIONS[format.rotation];
  const fx = format.flip[0] ? -1 : 1;
  const fy = format.flip[1] ? -1 : 1;

  const out = createCanvas(width, height);
  const ctx = out.getContext("2d");
  // Same-size input maps pixel centers onto pixel centers; only resample when scaling
  const scaled = image.width !== drawWidth || image.height !== drawHeight;
  ctx.imageSmoothingEnabled = scaled;
  ctx.imageSmoothingQuality = "high";
  ctx.setTransform(a * fx, b * fy, c * fx, d * fy, width / 2, height / 2);
  ctx.drawImage(image, -drawWidth / 2, -drawHeight / 2, drawWidth, drawHeight);
  return out;
}

/** Orient and encode a key image into the bytes the device accepts. */
export function toNativeKeyFormat(image: Canvas, format: KeyImageFormat): Buffer {
  const oriented = orientKeyImage(image, format);
  return format.format === "PNG"
    ? oriented.toBuffer("image/png")
    : oriented.toBuffer("image/jpeg", JPEG_QUALITY);
}

/**
 * Memoizes native encodings per key image, so a cached render is encoded
 * once per session. Entries die with their canvas.
 */
export class NativeImageEncoder {
  private format: KeyImageFormat;
  private encoded = new WeakMap<Canvas, Buffer>();

  constructor(format: KeyImageFormat) {
    this.format = format;
  }

  encode(image: Canvas): Buffer {
    const cached = this.encoded.get(image);
    if (cached) return cached;
    const bytes = toNativeKeyFormat(image, this.format);
    this.encoded.set(image, bytes);
    return bytes;
  }
}
