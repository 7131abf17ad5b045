/**
 * Main Z407 puck device class.
 */

import { discoverPuck } from './discovery';
import { ConfirmationTimeoutError, DisconnectedError, PuckError } from './exceptions';
import { InputSource, PuckCommand } from './models/enums';
import type { ConfirmationEvent, PuckEvent, PuckEventListener } from './models/events';
import type { HandshakeState } from './models/handshake';
import { PuckStateTracker, type PuckStateSnapshot } from './models/puck-state';
import { CONFIRM_TIMEOUT_MS } from './protocol/constants';
import { confirmationFor } from './protocol/notifications';
import { EventWaiter } from './session/event-waiter';
import { PuckSession } from './session/session';
import { NobleTransport } from './transport/noble-transport';
import type { PuckTransport } from './transport/transport';

export interface PuckDeviceOptions {
  /**
   * Already-open transport. When omitted, `connect()` scans with noble.
   * The device disconnects it on `disconnect()` or a failed `connect()`.
   */
  transport?: PuckTransport;

  /** Advertised name to scan for (default: "Logitech Z407") */
  name?: string;

  /** Peripheral address to connect to instead of matching the name */
  address?: string;

  /** Scan timeout in milliseconds */
  scanTimeoutMs?: number;

  /** Per-step handshake timeout in milliseconds */
  handshakeTimeoutMs?: number;
}

export type SoundCue = 1 | 2 | 3;

const SWITCH_COMMANDS: Readonly<Record<InputSource, PuckCommand>> = {
  [InputSource.BLUETOOTH]: PuckCommand.SWITCH_BLUETOOTH,
  [InputSource.AUX]: PuckCommand.SWITCH_AUX,
  [InputSource.USB]: PuckCommand.SWITCH_USB,
};

const SOUND_COMMANDS: Readonly<Record<SoundCue, PuckCommand>> = {
  1: PuckCommand.SOUND_1,
  2: PuckCommand.SOUND_2,
  3: PuckCommand.SOUND_3,
};

function isConfirmationEvent(event: PuckEvent): event is ConfirmationEvent {
  return event.category === 'confirmation';
}

/**
 * Logitech Z407 control puck.
 *
 * Main API for controlling the speakers over BLE. Commands are
 * fire-and-forget; use {@link PuckDevice.sendAndConfirm} to wait for the
 * puck's echo.
 *
 * Media keys (play/pause, next, previous) are confirmed for the Bluetooth
 * source. Their effect on AUX is unconfirmed and may differ.
 *
 * @example
 * ```typescript
 * const puck = new PuckDevice();
 * await puck.connect();
 * await puck.volumeUp();
 * await puck.switchInput(InputSource.AUX);
 * await puck.disconnect();
 *
 * // With a transport opened elsewhere
 * const puck = new PuckDevice({ transport });
 * ```
 */
export class PuckDevice {
  static readonly DEFAULT_CONFIRM_TIMEOUT_MS = CONFIRM_TIMEOUT_MS;

  private transport: PuckTransport | null = null;
  private session: PuckSession | null = null;
  private readonly tracker = new PuckStateTracker();
  private readonly waiter = new EventWaiter();
  private readonly listeners = new Set<PuckEventListener>();
  private connecting: Promise<void> | null = null;

  constructor(private readonly options: PuckDeviceOptions = {}) {}

  /**
   * Check if the handshake has completed on a live connection.
   */
  get isConnected(): boolean {
    return this.session?.isReady ?? false;
  }

  /**
   * Current handshake state (idle when never connected).
   */
  get handshakeState(): HandshakeState {
    return this.session?.state ?? { phase: 'idle' };
  }

  /**
   * Best-effort state inferred from events since connecting.
   */
  get state(): PuckStateSnapshot {
    return this.tracker.snapshot();
  }

  /**
   * Connect to the puck and run the handshake.
   *
   * @throws {BLETimeoutError} If no puck is found
   * @throws {BLEConnectionError} If the GATT connection fails
   * @throws {HandshakeTimeoutError} If the puck does not complete the handshake
   */
  async connect(): Promise<void> {
    if (this.connecting) {
      throw new PuckError('Connection already in progress');
    }
    if (this.session?.isActive) {
      throw new PuckError('Already connected; call disconnect() first');
    }

    this.connecting = this.establishConnection();
    try {
      await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  /**
   * Disconnect from the puck.
   */
  async disconnect(): Promise<void> {
    await this.teardown();
  }

  /**
   * Register a listener for events from the puck.
   *
   * @returns Function that removes the listener
   */
  onEvent(listener: PuckEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Send a command without waiting for confirmation.
   *
   * @throws {DisconnectedError} If not connected
   * @throws {NotReadyError} If the handshake has not completed
   */
  async send(command: PuckCommand): Promise<void> {
    await this.ensureSession().sendCommand(command);
  }

  /**
   * Send a command and wait for the puck to echo it.
   *
   * The puck does not always confirm (e.g. volume changes while nothing is
   * playing), so a timeout does not mean the command was lost.
   *
   * @param command - Command to send
   * @param timeoutMs - Maximum time to wait for the confirmation
   * @returns The confirmation event, or undefined for commands the puck never confirms
   * @throws {ConfirmationTimeoutError} If no confirmation arrives in time
   */
  async sendAndConfirm(
    command: PuckCommand,
    timeoutMs: number = PuckDevice.DEFAULT_CONFIRM_TIMEOUT_MS
  ): Promise<ConfirmationEvent | undefined> {
    const session = this.ensureSession();

    if (!confirmationFor(command)) {
      await session.sendCommand(command);
      return undefined;
    }

    const pending = this.waiter.waitFor(
      (event): event is ConfirmationEvent =>
        isConfirmationEvent(event) && event.command === command,
      timeoutMs,
      () =>
        new ConfirmationTimeoutError(
          `No ${command} confirmation received within ${timeoutMs}ms`,
          command
        )
    );

    const sent = session.sendCommand(command);
    try {
      const [, event] = await Promise.all([sent, pending.promise]);
      return event;
    } catch (error) {
      pending.cancel();
      // A failed write clears the waiter too; surface the write error
      await sent;
      throw error;
    }
  }

  volumeUp(): Promise<void> {
    return this.send(PuckCommand.VOLUME_UP);
  }

  volumeDown(): Promise<void> {
    return this.send(PuckCommand.VOLUME_DOWN);
  }

  bassUp(): Promise<void> {
    return this.send(PuckCommand.BASS_UP);
  }

  bassDown(): Promise<void> {
    return this.send(PuckCommand.BASS_DOWN);
  }

  playPause(): Promise<void> {
    return this.send(PuckCommand.PLAY_PAUSE);
  }

  nextTrack(): Promise<void> {
    return this.send(PuckCommand.NEXT_TRACK);
  }

  previousTrack(): Promise<void> {
    return this.send(PuckCommand.PREV_TRACK);
  }

  /**
   * Select the audio input.
   *
   * The puck reports SWITCHED_* only if the source actually changed, so no
   * event after switching to the current source is expected.
   */
  switchInput(source: InputSource): Promise<void> {
    return this.send(SWITCH_COMMANDS[source]);
  }

  /**
   * Play one of the puck's sound cues.
   *
   * Cue 2 is the one the puck plays on a long bass press; the puck leaves
   * bass mode on its own after about 15 seconds.
   */
  playSound(cue: SoundCue): Promise<void> {
    return this.send(SOUND_COMMANDS[cue]);
  }

  /**
   * Put the speakers into Bluetooth pairing mode.
   */
  enterPairing(): Promise<void> {
    return this.send(PuckCommand.PAIRING);
  }

  /**
   * Reset the speakers to factory settings.
   */
  factoryReset(): Promise<void> {
    return this.send(PuckCommand.FACTORY_RESET);
  }

  private async establishConnection(): Promise<void> {
    const transport = this.options.transport ?? (await this.openNobleTransport());
    const session = new PuckSession(transport, {
      handshakeTimeoutMs: this.options.handshakeTimeoutMs,
    });

    session.onEvent((event) => this.handleEvent(event));
    session.onStateChange((state) => {
      if (state.phase === 'idle') {
        this.tracker.reset();
        this.waiter.clear('Connection lost');
      }
    });

    this.transport = transport;
    this.session = session;

    try {
      await session.establish();
    } catch (error) {
      await this.teardown();
      throw error;
    }
  }

  private async openNobleTransport(): Promise<PuckTransport> {
    const peripheral = await discoverPuck({
      name: this.options.name,
      address: this.options.address,
      timeoutMs: this.options.scanTimeoutMs,
    });
    return NobleTransport.open(peripheral);
  }

  private handleEvent(event: PuckEvent): void {
    this.tracker.apply(event);
    this.waiter.dispatch(event);

    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error(`Event listener failed on ${event.type}:`, error);
      }
    }
  }

  private async teardown(): Promise<void> {
    const transport = this.transport;
    this.waiter.clear('Disconnected by request');
    this.session?.close();
    this.session = null;
    this.transport = null;
    this.tracker.reset();

    if (transport) {
      await transport.disconnect();
    }
  }

  private ensureSession(): PuckSession {
    if (!this.session) {
      throw new DisconnectedError('Not connected to puck');
    }
    return this.session;
  }
}
