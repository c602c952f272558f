import { UNKNOWN_TAG, writeTagsEqual } from "../types";
import type { WriteTag } from "../types";

export type KeyWriter<TImage> = (key: number, image: TImage) => Promise<void>;

/**
 * Tracks what each physical key currently shows and skips writes that would
 * not change it. Every key write goes through `maybeWrite`.
 *
 * A tag is recorded only after its write succeeds. A failed write leaves the
 * previous tag in place, so the same candidate is written again on the next
 * cycle.
 */
export class WriteSuppressor {
  private tags: WriteTag[];

  constructor(keyCount: number) {
    this.tags = new Array<WriteTag>(keyCount).fill(UNKNOWN_TAG);
  }

  get keyCount(): number {
    return this.tags.length;
  }

  tagFor(key: number): WriteTag {
    return this.tags[key] ?? UNKNOWN_TAG;
  }

  /** Returns true when a write was issued. */
  async maybeWrite<TImage>(
    key: number,
    candidate: WriteTag,
    image: TImage,
    write: KeyWriter<TImage>,
  ): Promise<boolean> {
    if (writeTagsEqual(this.tagFor(key), candidate)) return false;
    await write(key, image);
    this.tags[key] = candidate;
    return true;
  }

  /** Forget all keys, so the next write to each one goes through. */
  reset(): void {
    this.tags.fill(UNKNOWN_TAG);
  }
}
