/**
 * Decoded notification events.
 */

import { InputSource, PuckCommand, PuckEventType } from './enums';

export type HandshakeEventType =
  | PuckEventType.INITIATE_RESPONSE
  | PuckEventType.ACKNOWLEDGE_RESPONSE
  | PuckEventType.CONNECTED;

export type SwitchedEventType =
  | PuckEventType.SWITCHED_BLE
  | PuckEventType.SWITCHED_AUX
  | PuckEventType.SWITCHED_USB;

export type ConfirmationEventType = Exclude<
  PuckEventType,
  HandshakeEventType | SwitchedEventType | PuckEventType.UNRECOGNIZED
>;

/**
 * Response to one of the three handshake steps.
 */
export interface HandshakeEvent {
  category: 'handshake';
  type: HandshakeEventType;
  raw: Uint8Array;
}

/**
 * Echo of a user command, sent by the puck once it has acted on it.
 *
 * Best-effort: the puck may stay silent (e.g. volume changes while no
 * audio is playing).
 */
export interface ConfirmationEvent {
  category: 'confirmation';
  type: ConfirmationEventType;
  command: PuckCommand;
  raw: Uint8Array;
}

/**
 * Source switch completed. Only emitted when the source actually changed.
 */
export interface SwitchedEvent {
  category: 'switched';
  type: SwitchedEventType;
  source: InputSource;
  raw: Uint8Array;
}

/**
 * Notification the decoder has no mapping for. Carries the payload as received.
 */
export interface UnrecognizedEvent {
  category: 'unrecognized';
  type: PuckEventType.UNRECOGNIZED;
  raw: Uint8Array;
}

export type PuckEvent =
  | HandshakeEvent
  | ConfirmationEvent
  | SwitchedEvent
  | UnrecognizedEvent;

export type PuckEventListener = (event: PuckEvent) => void;
