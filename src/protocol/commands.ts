/**
 * BLE protocol command codec for the Z407 puck.
 */

import { PuckCommand } from '../models/enums';
import { CommandGroup } from './constants';
import { toHex } from './hex';

type Opcode = readonly [group: CommandGroup, code: number];

/**
 * Opcode table. Every command has exactly one 2-byte encoding.
 */
const COMMAND_OPCODES: Readonly<Record<PuckCommand, Opcode>> = {
  [PuckCommand.INITIATE]: [CommandGroup.HANDSHAKE, 0x05],
  [PuckCommand.ACKNOWLEDGE]: [CommandGroup.HANDSHAKE, 0x00],

  [PuckCommand.BASS_UP]: [CommandGroup.AUDIO, 0x00],
  [PuckCommand.BASS_DOWN]: [CommandGroup.AUDIO, 0x01],
  [PuckCommand.VOLUME_UP]: [CommandGroup.AUDIO, 0x02],
  [PuckCommand.VOLUME_DOWN]: [CommandGroup.AUDIO, 0x03],
  [PuckCommand.PLAY_PAUSE]: [CommandGroup.AUDIO, 0x04],
  [PuckCommand.NEXT_TRACK]: [CommandGroup.AUDIO, 0x05],
  [PuckCommand.PREV_TRACK]: [CommandGroup.AUDIO, 0x06],

  [PuckCommand.SWITCH_BLUETOOTH]: [CommandGroup.INPUT, 0x01],
  [PuckCommand.SWITCH_AUX]: [CommandGroup.INPUT, 0x02],
  [PuckCommand.SWITCH_USB]: [CommandGroup.INPUT, 0x03],

  [PuckCommand.PAIRING]: [CommandGroup.PAIRING, 0x00],
  [PuckCommand.FACTORY_RESET]: [CommandGroup.FACTORY_RESET, 0x00],

  [PuckCommand.UNKNOWN_1]: [CommandGroup.SOUND, 0x00],
  [PuckCommand.SOUND_1]: [CommandGroup.SOUND, 0x01],
  [PuckCommand.SOUND_2]: [CommandGroup.SOUND, 0x02],
  [PuckCommand.SOUND_3]: [CommandGroup.SOUND, 0x03],
};

const COMMANDS_BY_OPCODE: ReadonlyMap<string, PuckCommand> = new Map(
  Object.values(PuckCommand).map((command): [string, PuckCommand] => [
    toHex(Uint8Array.from(COMMAND_OPCODES[command])),
    command,
  ])
);

const HANDSHAKE_COMMANDS: ReadonlySet<PuckCommand> = new Set([
  PuckCommand.INITIATE,
  PuckCommand.ACKNOWLEDGE,
]);

/**
 * Encode a command into its wire opcode.
 *
 * @returns Command bytes (2 bytes, written as-is to the command characteristic)
 *
 * @example
 * ```typescript
 * encodeCommand(PuckCommand.VOLUME_UP); // Uint8Array [0x80, 0x02]
 * ```
 */
export function encodeCommand(command: PuckCommand): Uint8Array {
  return Uint8Array.from(COMMAND_OPCODES[command]);
}

/**
 * Look up the command a 2-byte opcode encodes.
 *
 * @returns The command, or undefined if the bytes are not a known opcode
 */
export function commandFromOpcode(data: Uint8Array): PuckCommand | undefined {
  return COMMANDS_BY_OPCODE.get(toHex(data));
}

/**
 * Whether the command belongs to the connect handshake.
 */
export function isHandshakeCommand(command: PuckCommand): boolean {
  return HANDSHAKE_COMMANDS.has(command);
}
