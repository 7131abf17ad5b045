/**
 * Session controller for one puck connection.
 */

import {
  DisconnectedError,
  NotReadyError,
  PuckError,
  TransportWriteError,
} from '../exceptions';
import { PuckCommand } from '../models/enums';
import type { PuckEvent, PuckEventListener } from '../models/events';
import type { HandshakeState, HandshakeStateListener } from '../models/handshake';
import { encodeCommand, isHandshakeCommand } from '../protocol/commands';
import { HANDSHAKE_STEP_TIMEOUT_MS } from '../protocol/constants';
import { toHex } from '../protocol/hex';
import { decodeNotification } from '../protocol/notifications';
import type { PuckTransport } from '../transport/transport';
import { HandshakeCoordinator } from './handshake-coordinator';

export interface PuckSessionOptions {
  /** Time allowed for each handshake response in milliseconds */
  handshakeTimeoutMs?: number;
}

/**
 * Logical command/event interface over a puck transport.
 *
 * Owns the handshake state for the connection. Until the handshake reaches
 * `ready`, every notification goes to the handshake coordinator and user
 * commands are rejected with {@link NotReadyError} (they are not queued).
 * A failed handshake is terminal: every later command is rejected.
 * Afterwards notifications are decoded and delivered to `onEvent` listeners.
 *
 * The transport is borrowed: closing the session does not disconnect it.
 *
 * @example
 * ```typescript
 * const session = await establishSession(transport);
 * session.onEvent((event) => console.log(event.type));
 * await session.sendCommand(PuckCommand.VOLUME_UP);
 * ```
 */
export class PuckSession {
  static readonly DEFAULT_STEP_TIMEOUT_MS = HANDSHAKE_STEP_TIMEOUT_MS;

  private readonly coordinator: HandshakeCoordinator;
  private readonly eventListeners = new Set<PuckEventListener>();
  private readonly stateListeners = new Set<HandshakeStateListener>();
  private active = true;
  private started = false;

  constructor(
    private readonly transport: PuckTransport,
    options: PuckSessionOptions = {}
  ) {
    this.coordinator = new HandshakeCoordinator({
      stepTimeoutMs: options.handshakeTimeoutMs ?? PuckSession.DEFAULT_STEP_TIMEOUT_MS,
      send: (command) => this.write(command),
      onStateChange: (state) => this.emitState(state),
    });
  }

  /**
   * Current handshake state.
   */
  get state(): HandshakeState {
    return this.coordinator.state;
  }

  /**
   * True once the handshake has completed on a live connection.
   */
  get isReady(): boolean {
    return this.active && this.coordinator.state.phase === 'ready';
  }

  /**
   * False after connection loss, a failed write, a failed handshake, or `close()`.
   */
  get isActive(): boolean {
    return this.active && this.coordinator.state.phase !== 'failed';
  }

  /**
   * Subscribe to notifications and run the handshake.
   *
   * @throws {HandshakeTimeoutError} If the puck stops answering mid-handshake
   * @throws {DisconnectedError} If the connection drops first
   */
  async establish(): Promise<void> {
    if (this.started) {
      throw new PuckError('Session already established');
    }
    this.started = true;
    this.ensureActive('establish session');

    this.transport.onDisconnect(() => this.handleConnectionLost());
    await this.transport.subscribe((data) => this.handleNotification(data));
    this.ensureActive('establish session');

    console.log('Starting puck handshake');
    try {
      await this.coordinator.start();
    } catch (error) {
      if (error instanceof TransportWriteError) {
        this.invalidate('Handshake write failed');
      }
      throw error;
    }
    console.log('Handshake complete, puck ready');
  }

  /**
   * Encode and write a command.
   *
   * Fire-and-forget: resolves once the transport accepted the write, not when
   * the puck confirms it. Confirmations arrive (if at all) through `onEvent`.
   *
   * @throws {DisconnectedError} If the session was invalidated
   * @throws {NotReadyError} If a user command is sent before the handshake completed,
   *   or any command after it failed
   * @throws {TransportWriteError} If the write fails (the session is invalidated)
   */
  async sendCommand(command: PuckCommand): Promise<void> {
    this.ensureActive(`send ${command}`);

    const phase = this.coordinator.state.phase;
    if (phase === 'failed' || (!isHandshakeCommand(command) && phase !== 'ready')) {
      throw new NotReadyError(
        `Cannot send ${command}: handshake is ${describeState(this.coordinator.state)}`
      );
    }

    try {
      await this.write(command);
    } catch (error) {
      this.invalidate('Command write failed');
      throw error;
    }
  }

  /**
   * Route one notification from the response characteristic.
   */
  handleNotification(data: Uint8Array): void {
    if (!this.active) {
      console.debug(`Dropping notification ${toHex(data)} on inactive session`);
      return;
    }

    const event = decodeNotification(data);
    console.debug(`RX ${toHex(event.raw)} -> ${event.type}`);

    if (this.coordinator.state.phase !== 'ready') {
      this.coordinator.handleEvent(event);
      return;
    }

    this.emitEvent(event);
  }

  /**
   * Transport reported connection loss.
   *
   * A handshake in flight fails, the state returns to `idle`, and every
   * later `sendCommand` rejects with {@link DisconnectedError}.
   */
  handleConnectionLost(): void {
    this.invalidate('Connection lost');
  }

  /**
   * Invalidate the session without touching the transport.
   */
  close(): void {
    this.invalidate('Session closed');
  }

  /**
   * Register a listener for decoded events (after the handshake).
   *
   * @returns Function that removes the listener
   */
  onEvent(listener: PuckEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  /**
   * Register a listener for handshake state changes.
   *
   * @returns Function that removes the listener
   */
  onStateChange(listener: HandshakeStateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  private async write(command: PuckCommand): Promise<void> {
    const data = encodeCommand(command);
    console.debug(`TX ${command} (${toHex(data)})`);

    try {
      await this.transport.write(data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportWriteError(`Failed to write ${command}: ${message}`);
    }
  }

  private invalidate(reason: string): void {
    if (!this.active) {
      return;
    }
    console.log(`${reason}, invalidating puck session`);
    this.active = false;
    this.coordinator.reset();
  }

  private ensureActive(action: string): void {
    if (!this.active) {
      throw new DisconnectedError(`Cannot ${action}: session is disconnected`);
    }
  }

  private emitEvent(event: PuckEvent): void {
    for (const listener of [...this.eventListeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error(`Event listener failed on ${event.type}:`, error);
      }
    }
  }

  private emitState(state: HandshakeState): void {
    for (const listener of [...this.stateListeners]) {
      try {
        listener(state);
      } catch (error) {
        console.error(`State listener failed on ${state.phase}:`, error);
      }
    }
  }
}

function describeState(state: HandshakeState): string {
  return state.phase === 'failed'
    ? `failed (${state.reason} in ${state.failedIn})`
    : state.phase;
}

/**
 * Open a session on a connected transport and wait for the handshake.
 *
 * @returns The ready session
 * @throws {HandshakeTimeoutError} If the puck does not complete the handshake
 * @throws {DisconnectedError} If the connection drops during the handshake
 */
export async function establishSession(
  transport: PuckTransport,
  options: PuckSessionOptions = {}
): Promise<PuckSession> {
  const session = new PuckSession(transport, options);
  await session.establish();
  return session;
}
