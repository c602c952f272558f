import type { Canvas } from "@napi-rs/canvas";
import type { RenderKey } from "../../types";

/** Exact-match cache identity for a render key. */
export function renderKeyString(key: RenderKey): string {
  return JSON.stringify([key.icon, key.label, key.background]);
}

interface TileCacheEntry {
  key: RenderKey;
  image: Canvas;
  lastAccess: number;
}

/**
 * Rendered key images by render key.
 *
 * Capacity 0 means unbounded: the key space is bounded in practice by the
 * configured buttons times two selection states. With a positive capacity
 * the least recently used entry is evicted on insert.
 */
export class TileCache {
  private tiles = new Map<string, TileCacheEntry>();
  private capacity: number;
  private clock = 0;

  constructor(capacity = 0) {
    this.capacity = Math.max(0, Math.floor(capacity));
  }

  /** Cached images are shared; callers must not draw into them. */
  get(key: RenderKey): Canvas | undefined {
    const entry = this.tiles.get(renderKeyString(key));
    if (!entry) return undefined;
    entry.lastAccess = ++this.clock;
    return entry.image;
  }

  has(key: RenderKey): boolean {
    return this.tiles.has(renderKeyString(key));
  }

  set(key: RenderKey, image: Canvas): void {
    const keyStr = renderKeyString(key);
    if (!this.tiles.has(keyStr)) this.evictIfNeeded();
    this.tiles.set(keyStr, { key, image, lastAccess: ++this.clock });
  }

  private evictIfNeeded(): void {
    if (this.capacity === 0) return;
    while (this.tiles.size >= this.capacity) {
      let oldest: string | null = null;
      let oldestTime = Infinity;
      for (const [keyStr, entry] of this.tiles) {
        if (entry.lastAccess < oldestTime) {
          oldestTime = entry.lastAccess;
          oldest = keyStr;
        }
      }
      if (oldest === null) break;
      this.tiles.delete(oldest);
    }
  }

  /** Render keys currently cached, oldest access first. */
  keys(): RenderKey[] {
    return [...this.tiles.values()]
      .sort((a, b) => a.lastAccess - b.lastAccess)
      .map((entry) => entry.key);
  }

  get size(): number { return this.tiles.size; }
  get maxEntries(): number { return this.capacity; }
  clear(): void { this.tiles.clear(); }
}
