/**
 * BLE protocol constants for the Z407 puck.
 */

export const DEVICE_NAME = 'Logitech Z407';

export const SERVICE_UUID = '0000fdc2-0000-1000-8000-00805f9b34fb';
export const COMMAND_CHARACTERISTIC_UUID = 'c2e758b9-0e78-41e0-b0cb-98a593193fc5';
export const RESPONSE_CHARACTERISTIC_UUID = 'b84ac9c6-29c5-46d4-bba1-9d534784330f';

// Frame lengths
export const COMMAND_LENGTH = 2;
export const HANDSHAKE_RESPONSE_LENGTH = 3;
export const NOTIFICATION_LENGTH = 2;

// Timeouts (milliseconds)
export const SCAN_TIMEOUT_MS = 10000;
export const HANDSHAKE_STEP_TIMEOUT_MS = 5000;
export const CONFIRM_TIMEOUT_MS = 2000;

/**
 * First byte of a command opcode.
 */
export enum CommandGroup {
  AUDIO = 0x80,
  INPUT = 0x81,
  PAIRING = 0x82,
  FACTORY_RESET = 0x83,
  HANDSHAKE = 0x84,
  SOUND = 0x85,
}

/**
 * First byte of a notification frame.
 */
export enum NotificationPrefix {
  AUDIO = 0xc0,
  INPUT = 0xc1,
  PAIRING = 0xc2,
  FACTORY_RESET = 0xc3,
  SOUND = 0xc5,
  SWITCHED = 0xcf,
  HANDSHAKE = 0xd4,
}
