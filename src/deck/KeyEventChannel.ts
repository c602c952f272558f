import type { OutputPublisher } from "./DeckTransport";

export interface KeyEvent {
  key: number;
  pressed: boolean;
}

/**
 * Decouples key callbacks from publishing.
 *
 * `push` only enqueues and returns; events are delivered to the publisher in
 * order on a later microtask, one at a time. Publisher failures are logged
 * and do not stop delivery of later events.
 */
export class KeyEventChannel {
  private pendingEvents: KeyEvent[] = [];
  private draining: Promise<void> | null = null;
  private publisher: OutputPublisher;

  constructor(publisher: OutputPublisher) {
    this.publisher = publisher;
  }

  push(event: KeyEvent): void {
    this.pendingEvents.push(event);
    if (!this.draining) {
      this.draining = new Promise<void>((resolve) => {
        queueMicrotask(() => {
          void this.drain().then(resolve);
        });
      });
    }
  }

  get pending(): number {
    return this.pendingEvents.length;
  }

  /** Resolves once every event pushed so far has been delivered. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Drop undelivered events. */
  cancel(): void {
    this.pendingEvents = [];
  }

  private async drain(): Promise<void> {
    let event = this.pendingEvents.shift();
    while (event) {
      try {
        await this.publisher.sendButtonSelected(event.key, event.pressed);
      } catch (e) {
        console.error(`[KeyEventChannel] Failed to publish key ${event.key}:`, e);
      }
      event = this.pendingEvents.shift();
    }
    this.draining = null;
  }
}
