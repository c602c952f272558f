import type { Canvas } from "@napi-rs/canvas";
import type { ButtonState, RenderKey } from "../types";
import { BACKGROUND_TAG, EMPTY_TAG, renderedTag } from "../types";
import type { DeckConfigView, DeckTransport, OutputPublisher } from "./DeckTransport";
import type { AssetLoader } from "../canvas/AssetLoader";
import { FileAssetLoader } from "../canvas/AssetLoader";
import type { ControllerSettings } from "../settings/ControllerSettings";
import { createDeckSession } from "./DeckSession";
import type { DeckSession } from "./DeckSession";
import { KeyEventChannel } from "./KeyEventChannel";
import { SerialQueue } from "./SerialQueue";
import { IndexOutOfRangeError, TransportError } from "./DeckErrors";

/**
 * Drives one deck: renders the configured buttons onto its keys and forwards
 * key presses to the output publisher.
 *
 * Updates are triggered externally. Open, close and update run one at a
 * time; a press never renders or writes anything by itself.
 */
export class DeckController {
  private transport: DeckTransport;
  private config: DeckConfigView;
  private settings: ControllerSettings;
  private assets: AssetLoader;
  private events: KeyEventChannel;
  private queue = new SerialQueue();
  private session: DeckSession | null = null;
  private serialNumber = "";

  constructor(
    transport: DeckTransport,
    config: DeckConfigView,
    publisher: OutputPublisher,
    settings: ControllerSettings,
    assets: AssetLoader = new FileAssetLoader(settings.assetsPath),
  ) {
    this.transport = transport;
    this.config = config;
    this.settings = settings;
    this.assets = assets;
    this.events = new KeyEventChannel(publisher);
  }

  /** Current session state, or null while closed. */
  get currentSession(): DeckSession | null {
    return this.session;
  }

  isOpen(): boolean {
    return this.transport.isOpen();
  }

  open(): Promise<void> {
    return this.queue.run(async () => {
      await this.transport.open();
      try {
        this.serialNumber = await this.transport.getSerialNumber();
        const firmware = await this.transport.getFirmwareVersion();
        console.info(
          `[DeckController] Opened ${this.transport.deckType()} (sn: '${this.serialNumber}', fw: '${firmware}')`,
        );

        const session = await createDeckSession(this.transport, this.settings, this.assets);
        this.session = session;
        await this.transport.setBrightness(this.settings.brightness);
        this.transport.setKeyCallback((key, pressed) => this.onKeyChange(key, pressed));

        await this.runUpdate(session);
      } catch (e) {
        this.session = null;
        this.transport.setKeyCallback(null);
        await this.releaseTransport();
        throw e;
      }
    });
  }

  /**
   * Show the background on every key and release the device.
   * Transport failures here are logged, not thrown: the device may already be gone.
   */
  close(): Promise<void> {
    return this.queue.run(async () => {
      const session = this.session;
      this.session = null;
      if (!session || !this.transport.isOpen()) return;

      try {
        await this.renderBackground(session);
      } catch (e) {
        if (!(e instanceof TransportError)) throw e;
        console.warn(`[DeckController] Failed to restore background on close: ${e.message}`);
      } finally {
        session.suppressor.reset();
        this.transport.setKeyCallback(null);
        await this.releaseTransport();
      }
    });
  }

  /** Bring every key in line with the current configuration. */
  update(): Promise<void> {
    return this.queue.run(async () => {
      await this.runUpdate(this.requireSession());
    });
  }

  renderDefaultBackground(): Promise<void> {
    return this.queue.run(async () => {
      await this.renderBackground(this.requireSession());
    });
  }

  /** Render a key image in the device's native format, from cache when possible. */
  renderKey(key: RenderKey): Promise<Buffer> {
    return this.queue.run(async () => {
      const session = this.requireSession();
      return session.encoder.encode(await session.renderer.renderTile(key));
    });
  }

  /** Resolves once all key events received so far have been published. */
  flushKeyEvents(): Promise<void> {
    return this.events.flush();
  }

  private requireSession(): DeckSession {
    if (!this.session) throw new TransportError("Deck is not open");
    return this.session;
  }

  private async runUpdate(session: DeckSession): Promise<void> {
    if (!this.config.remoteConnected) {
      await this.renderBackground(session);
      return;
    }

    const buttons = this.config.buttons;
    for (let key = 0; key < session.suppressor.keyCount; key++) {
      const button = buttons[key];
      if (button) {
        await this.setKeyButton(session, key, button);
      } else {
        await this.setKeyEmpty(session, key);
      }
    }
  }

  private async renderBackground(session: DeckSession): Promise<void> {
    for (let key = 0; key < session.suppressor.keyCount; key++) {
      const tile = session.background.get(key);
      if (!tile) throw new IndexOutOfRangeError(key, session.background.size);
      await session.suppressor.maybeWrite(key, BACKGROUND_TAG, tile, this.writer(session));
    }
  }

  private async setKeyEmpty(session: DeckSession, key: number): Promise<void> {
    const tile = session.renderer.renderEmptyTile();
    await session.suppressor.maybeWrite(key, EMPTY_TAG, tile, this.writer(session));
  }

  private async setKeyButton(session: DeckSession, key: number, button: ButtonState): Promise<void> {
    const renderKey: RenderKey = {
      icon: button.icon,
      label: button.label,
      background: button.selected ? this.settings.activeColor : this.settings.notActiveColor,
    };
    const tile = await session.renderer.renderTile(renderKey);
    await session.suppressor.maybeWrite(key, renderedTag(renderKey), tile, this.writer(session));
  }

  private writer(session: DeckSession): (key: number, tile: Canvas) => Promise<void> {
    return (key, tile) => this.transport.setKeyImage(key, session.encoder.encode(tile));
  }

  private onKeyChange(key: number, pressed: boolean): void {
    console.info(`[DeckController] ${this.serialNumber} Key ${key} = ${pressed}`);
    this.events.push({ key, pressed });
  }

  private async releaseTransport(): Promise<void> {
    if (!this.transport.isOpen()) return;
    try {
      await this.transport.close();
      console.info(`[DeckController] Closed ${this.transport.deckType()}`);
    } catch (e) {
      if (!(e instanceof TransportError)) throw e;
      console.warn(`[DeckController] Ignoring close failure: ${e.message}`);
    }
  }
}
