/**
 * Enums for the Z407 puck protocol.
 */

/**
 * Logical commands written to the command characteristic.
 *
 * `INITIATE` and `ACKNOWLEDGE` are only valid during the connect handshake.
 */
export enum PuckCommand {
  // Handshake
  INITIATE = 'INITIATE',
  ACKNOWLEDGE = 'ACKNOWLEDGE',

  // Audio
  VOLUME_UP = 'VOLUME_UP',
  VOLUME_DOWN = 'VOLUME_DOWN',
  BASS_UP = 'BASS_UP',
  BASS_DOWN = 'BASS_DOWN',

  // Media keys
  PLAY_PAUSE = 'PLAY_PAUSE',
  NEXT_TRACK = 'NEXT_TRACK',
  PREV_TRACK = 'PREV_TRACK',

  // Input selection
  SWITCH_BLUETOOTH = 'SWITCH_BLUETOOTH',
  SWITCH_AUX = 'SWITCH_AUX',
  SWITCH_USB = 'SWITCH_USB',

  // Sound cues
  SOUND_1 = 'SOUND_1',
  SOUND_2 = 'SOUND_2',
  SOUND_3 = 'SOUND_3',

  // Maintenance
  PAIRING = 'PAIRING',
  FACTORY_RESET = 'FACTORY_RESET',
  UNKNOWN_1 = 'UNKNOWN_1',
}

/**
 * Logical events decoded from response-characteristic notifications.
 *
 * Confirmation events share their name with the command they echo.
 */
export enum PuckEventType {
  // Handshake responses (3-byte frames)
  INITIATE_RESPONSE = 'INITIATE_RESPONSE',
  ACKNOWLEDGE_RESPONSE = 'ACKNOWLEDGE_RESPONSE',
  CONNECTED = 'CONNECTED',

  // Command confirmations
  VOLUME_UP = 'VOLUME_UP',
  VOLUME_DOWN = 'VOLUME_DOWN',
  BASS_UP = 'BASS_UP',
  BASS_DOWN = 'BASS_DOWN',
  PLAY_PAUSE = 'PLAY_PAUSE',
  NEXT_TRACK = 'NEXT_TRACK',
  PREV_TRACK = 'PREV_TRACK',
  SWITCH_BLUETOOTH = 'SWITCH_BLUETOOTH',
  SWITCH_AUX = 'SWITCH_AUX',
  SWITCH_USB = 'SWITCH_USB',
  SOUND_1 = 'SOUND_1',
  SOUND_2 = 'SOUND_2',
  SOUND_3 = 'SOUND_3',
  PAIRING = 'PAIRING',
  FACTORY_RESET = 'FACTORY_RESET',
  UNKNOWN_1 = 'UNKNOWN_1',

  // Source switch completed (only sent if the source changed)
  SWITCHED_BLE = 'SWITCHED_BLE',
  SWITCHED_AUX = 'SWITCHED_AUX',
  SWITCHED_USB = 'SWITCHED_USB',

  UNRECOGNIZED = 'UNRECOGNIZED',
}

/**
 * Audio input sources selectable on the puck.
 */
export enum InputSource {
  BLUETOOTH = 'BLUETOOTH',
  AUX = 'AUX',
  USB = 'USB',
}
