/**
 * Connect-time handshake state machine.
 *
 * The puck ignores every command until it has seen INITIATE, answered it,
 * seen ACKNOWLEDGE, answered that, and finally reported CONNECTED:
 *
 *   idle -> awaitingInitiateAck      (send INITIATE)
 *        -> awaitingAcknowledgeAck   (on d4 05 01, send ACKNOWLEDGE)
 *        -> awaitingConnected        (on d4 00 01)
 *        -> ready                    (on d4 00 03)
 *
 * Each awaiting phase has its own timeout. Unexpected events are ignored;
 * the puck may still be flushing confirmations from a previous connection.
 */

import {
  DisconnectedError,
  HandshakeTimeoutError,
  PuckError,
  TransportWriteError,
} from '../exceptions';
import { PuckCommand, PuckEventType } from '../models/enums';
import type { HandshakeEventType, PuckEvent } from '../models/events';
import {
  IDLE_STATE,
  type AwaitingPhase,
  type HandshakeFailureReason,
  type HandshakeState,
  type HandshakeStateListener,
} from '../models/handshake';
import { HANDSHAKE_STEP_TIMEOUT_MS } from '../protocol/constants';

interface HandshakeStep {
  /** Command written on entering the phase */
  sends?: PuckCommand;
  expects: HandshakeEventType;
  next: AwaitingPhase | 'ready';
}

const STEPS: Readonly<Record<AwaitingPhase, HandshakeStep>> = {
  awaitingInitiateAck: {
    sends: PuckCommand.INITIATE,
    expects: PuckEventType.INITIATE_RESPONSE,
    next: 'awaitingAcknowledgeAck',
  },
  awaitingAcknowledgeAck: {
    sends: PuckCommand.ACKNOWLEDGE,
    expects: PuckEventType.ACKNOWLEDGE_RESPONSE,
    next: 'awaitingConnected',
  },
  awaitingConnected: {
    expects: PuckEventType.CONNECTED,
    next: 'ready',
  },
};

function isAwaiting(state: HandshakeState): state is { phase: AwaitingPhase } {
  return state.phase in STEPS;
}

export interface HandshakeCoordinatorOptions {
  /** Writes a handshake command to the puck */
  send: (command: PuckCommand) => Promise<void>;

  /** Time allowed for each of the three responses (default: 5000) */
  stepTimeoutMs?: number;

  onStateChange?: HandshakeStateListener;
}

interface Completion {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class HandshakeCoordinator {
  private _state: HandshakeState = IDLE_STATE;
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  private completion: Completion | null = null;
  private readonly stepTimeoutMs: number;

  constructor(private readonly options: HandshakeCoordinatorOptions) {
    this.stepTimeoutMs = options.stepTimeoutMs ?? HANDSHAKE_STEP_TIMEOUT_MS;
  }

  get state(): HandshakeState {
    return this._state;
  }

  /**
   * Run the handshake from `idle`.
   *
   * @returns Promise that resolves once the puck reports CONNECTED
   * @throws {HandshakeTimeoutError} If a response does not arrive in time
   * @throws {TransportWriteError} If INITIATE or ACKNOWLEDGE cannot be written
   * @throws {DisconnectedError} If the connection drops mid-handshake
   */
  start(): Promise<void> {
    if (this._state.phase !== 'idle') {
      return Promise.reject(
        new PuckError(`Handshake already started (phase: ${this._state.phase})`)
      );
    }

    return new Promise<void>((resolve, reject) => {
      this.completion = { resolve, reject };
      this.enter('awaitingInitiateAck');
    });
  }

  /**
   * Feed a decoded notification to the state machine.
   *
   * @returns True if the event advanced the handshake
   */
  handleEvent(event: PuckEvent): boolean {
    const state = this._state;
    if (!isAwaiting(state)) {
      return false;
    }

    const step = STEPS[state.phase];
    if (event.type !== step.expects) {
      console.debug(`Ignoring ${event.type} while ${state.phase}`);
      return false;
    }

    this.clearTimer();

    if (step.next === 'ready') {
      this.setState({ phase: 'ready' });
      this.completion?.resolve();
      this.completion = null;
    } else {
      this.enter(step.next);
    }
    return true;
  }

  /**
   * Fail an in-flight handshake because the connection dropped.
   * No-op outside the awaiting phases.
   */
  abort(): void {
    const state = this._state;
    if (isAwaiting(state)) {
      this.fail(
        'disconnected',
        state.phase,
        new DisconnectedError(`Connection lost during handshake (${state.phase})`)
      );
    }
  }

  /**
   * Cancel the timer and return to `idle`.
   */
  reset(): void {
    this.abort();
    this.clearTimer();
    if (this._state.phase !== 'idle') {
      this.setState(IDLE_STATE);
    }
  }

  private enter(phase: AwaitingPhase): void {
    this.setState({ phase });
    this.armTimer(phase);

    const command = STEPS[phase].sends;
    if (command) {
      this.options.send(command).catch((error: unknown) => {
        if (this._state.phase !== phase) {
          return;
        }
        const message = error instanceof Error ? error.message : String(error);
        this.fail(
          'write-failed',
          phase,
          error instanceof TransportWriteError
            ? error
            : new TransportWriteError(`Failed to write ${command}: ${message}`)
        );
      });
    }
  }

  private armTimer(phase: AwaitingPhase): void {
    this.clearTimer();
    const timeoutId = setTimeout(() => {
      if (this.timeoutId !== timeoutId || this._state.phase !== phase) {
        return;
      }
      this.timeoutId = null;
      this.fail(
        'timeout',
        phase,
        new HandshakeTimeoutError(
          `No ${STEPS[phase].expects} received within ${this.stepTimeoutMs}ms`,
          phase
        )
      );
    }, this.stepTimeoutMs);
    this.timeoutId = timeoutId;
  }

  private clearTimer(): void {
    if (this.timeoutId !== null) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
  }

  private fail(
    reason: HandshakeFailureReason,
    phase: AwaitingPhase,
    error: Error
  ): void {
    this.clearTimer();
    this.setState({ phase: 'failed', reason, failedIn: phase });
    console.warn(`Handshake failed (${reason}): ${error.message}`);
    this.completion?.reject(error);
    this.completion = null;
  }

  private setState(state: HandshakeState): void {
    this._state = state;
    this.options.onStateChange?.(state);
  }
}
