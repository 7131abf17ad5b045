/**
 * Notification decoding for the Z407 puck.
 *
 * Frames are dispatched on their first byte. Each prefix fixes the frame
 * length (3 bytes for handshake responses, 2 for everything else) and a
 * table of suffixes. Anything that does not match decodes to UNRECOGNIZED;
 * the puck has undocumented codes and decoding must never fail on them.
 */

import { InputSource, PuckCommand, PuckEventType } from '../models/enums';
import type {
  ConfirmationEventType,
  HandshakeEventType,
  PuckEvent,
  SwitchedEventType,
} from '../models/events';
import {
  HANDSHAKE_RESPONSE_LENGTH,
  NOTIFICATION_LENGTH,
  NotificationPrefix,
} from './constants';
import { toHex } from './hex';

type EventDescriptor =
  | { category: 'handshake'; type: HandshakeEventType }
  | { category: 'confirmation'; type: ConfirmationEventType; command: PuckCommand }
  | { category: 'switched'; type: SwitchedEventType; source: InputSource };

interface FrameTable {
  length: number;
  /** Keyed by the hex of the bytes after the prefix */
  events: ReadonlyMap<string, EventDescriptor>;
}

function handshake(type: HandshakeEventType): EventDescriptor {
  return { category: 'handshake', type };
}

function confirmation(
  type: ConfirmationEventType,
  command: PuckCommand
): EventDescriptor {
  return { category: 'confirmation', type, command };
}

function switched(type: SwitchedEventType, source: InputSource): EventDescriptor {
  return { category: 'switched', type, source };
}

const FRAME_TABLES: ReadonlyMap<number, FrameTable> = new Map<number, FrameTable>([
  [
    NotificationPrefix.HANDSHAKE,
    {
      length: HANDSHAKE_RESPONSE_LENGTH,
      events: new Map([
        ['0501', handshake(PuckEventType.INITIATE_RESPONSE)],
        ['0001', handshake(PuckEventType.ACKNOWLEDGE_RESPONSE)],
        ['0003', handshake(PuckEventType.CONNECTED)],
      ]),
    },
  ],
  [
    NotificationPrefix.AUDIO,
    {
      length: NOTIFICATION_LENGTH,
      events: new Map([
        ['00', confirmation(PuckEventType.BASS_UP, PuckCommand.BASS_UP)],
        ['01', confirmation(PuckEventType.BASS_DOWN, PuckCommand.BASS_DOWN)],
        ['02', confirmation(PuckEventType.VOLUME_UP, PuckCommand.VOLUME_UP)],
        ['03', confirmation(PuckEventType.VOLUME_DOWN, PuckCommand.VOLUME_DOWN)],
        ['04', confirmation(PuckEventType.PLAY_PAUSE, PuckCommand.PLAY_PAUSE)],
        ['05', confirmation(PuckEventType.NEXT_TRACK, PuckCommand.NEXT_TRACK)],
        ['06', confirmation(PuckEventType.PREV_TRACK, PuckCommand.PREV_TRACK)],
      ]),
    },
  ],
  [
    NotificationPrefix.INPUT,
    {
      length: NOTIFICATION_LENGTH,
      events: new Map([
        ['01', confirmation(PuckEventType.SWITCH_BLUETOOTH, PuckCommand.SWITCH_BLUETOOTH)],
        ['02', confirmation(PuckEventType.SWITCH_AUX, PuckCommand.SWITCH_AUX)],
        ['03', confirmation(PuckEventType.SWITCH_USB, PuckCommand.SWITCH_USB)],
      ]),
    },
  ],
  [
    NotificationPrefix.PAIRING,
    {
      length: NOTIFICATION_LENGTH,
      events: new Map([
        ['00', confirmation(PuckEventType.PAIRING, PuckCommand.PAIRING)],
      ]),
    },
  ],
  [
    NotificationPrefix.FACTORY_RESET,
    {
      length: NOTIFICATION_LENGTH,
      events: new Map([
        ['00', confirmation(PuckEventType.FACTORY_RESET, PuckCommand.FACTORY_RESET)],
      ]),
    },
  ],
  [
    NotificationPrefix.SOUND,
    {
      length: NOTIFICATION_LENGTH,
      // Sound codes are numbered in the opposite order to their commands
      events: new Map([
        ['00', confirmation(PuckEventType.UNKNOWN_1, PuckCommand.UNKNOWN_1)],
        ['01', confirmation(PuckEventType.SOUND_3, PuckCommand.SOUND_3)],
        ['02', confirmation(PuckEventType.SOUND_2, PuckCommand.SOUND_2)],
        ['03', confirmation(PuckEventType.SOUND_1, PuckCommand.SOUND_1)],
      ]),
    },
  ],
  [
    NotificationPrefix.SWITCHED,
    {
      length: NOTIFICATION_LENGTH,
      events: new Map([
        ['04', switched(PuckEventType.SWITCHED_BLE, InputSource.BLUETOOTH)],
        ['05', switched(PuckEventType.SWITCHED_AUX, InputSource.AUX)],
        ['06', switched(PuckEventType.SWITCHED_USB, InputSource.USB)],
      ]),
    },
  ],
]);

const CONFIRMATIONS_BY_COMMAND: ReadonlyMap<PuckCommand, ConfirmationEventType> =
  new Map(
    [...FRAME_TABLES.values()].flatMap((table) =>
      [...table.events.values()].flatMap(
        (descriptor): [PuckCommand, ConfirmationEventType][] =>
          descriptor.category === 'confirmation'
            ? [[descriptor.command, descriptor.type]]
            : []
      )
    )
  );

/**
 * Decode a notification received on the response characteristic.
 *
 * Never throws: unknown prefixes, unknown codes, wrong frame lengths and
 * empty payloads all decode to an UNRECOGNIZED event carrying the bytes.
 *
 * @param data - Raw notification payload
 * @returns Decoded event (with a private copy of the payload in `raw`)
 *
 * @example
 * ```typescript
 * decodeNotification(fromHex('d40003')); // { category: 'handshake', type: CONNECTED, ... }
 * decodeNotification(fromHex('c503'));   // SOUND_1 confirmation
 * ```
 */
export function decodeNotification(data: Uint8Array): PuckEvent {
  const raw = Uint8Array.from(data);
  const table = raw.length > 0 ? FRAME_TABLES.get(raw[0]) : undefined;
  const descriptor =
    table && raw.length === table.length
      ? table.events.get(toHex(raw.subarray(1)))
      : undefined;

  if (!descriptor) {
    return { category: 'unrecognized', type: PuckEventType.UNRECOGNIZED, raw };
  }

  return { ...descriptor, raw };
}

/**
 * Event type the puck sends to confirm a command.
 *
 * @returns The confirmation type, or undefined for the handshake commands
 */
export function confirmationFor(
  command: PuckCommand
): ConfirmationEventType | undefined {
  return CONFIRMATIONS_BY_COMMAND.get(command);
}

/**
 * Whether an event confirms the given command.
 */
export function isConfirmationOf(event: PuckEvent, command: PuckCommand): boolean {
  return event.category === 'confirmation' && event.command === command;
}
