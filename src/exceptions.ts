/**
 * Exception classes for the Z407 puck library.
 */

import type { HandshakePhase } from './models/handshake';
import type { PuckCommand } from './models/enums';

export class PuckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PuckError';
  }
}

/**
 * A user command was sent before the handshake reached `ready`.
 */
export class NotReadyError extends PuckError {
  constructor(message: string) {
    super(message);
    this.name = 'NotReadyError';
  }
}

export class HandshakeTimeoutError extends PuckError {
  constructor(
    message: string,
    readonly phase: HandshakePhase
  ) {
    super(message);
    this.name = 'HandshakeTimeoutError';
  }
}

/**
 * The transport signalled connection loss, or the session was closed.
 */
export class DisconnectedError extends PuckError {
  constructor(message: string) {
    super(message);
    this.name = 'DisconnectedError';
  }
}

/**
 * The transport rejected a write. Treated as a lost connection.
 */
export class TransportWriteError extends DisconnectedError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportWriteError';
  }
}

export class BLEConnectionError extends PuckError {
  constructor(message: string) {
    super(message);
    this.name = 'BLEConnectionError';
  }
}

export class BLETimeoutError extends PuckError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

export class ConfirmationTimeoutError extends PuckError {
  constructor(
    message: string,
    readonly command: PuckCommand
  ) {
    super(message);
    this.name = 'ConfirmationTimeoutError';
  }
}
