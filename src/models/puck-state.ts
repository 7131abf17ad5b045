/**
 * Best-effort puck state reconstructed from observed events.
 *
 * The puck cannot be queried: it only echoes commands and reports source
 * switches. Everything here is inferred from notifications seen since the
 * session started and is wrong after any missed notification. Values return
 * to unknown on connection loss.
 */

import { InputSource, PuckCommand } from './enums';
import type { PuckEvent } from './events';

export interface PuckStateSnapshot {
  /** Last source confirmed by the puck, or null if unknown */
  inputSource: InputSource | null;

  /** Net volume steps confirmed since the session started */
  volumeSteps: number;

  /** Net bass steps confirmed since the session started */
  bassSteps: number;

  /** Most recent event applied, if any */
  lastEvent: PuckEvent | null;
}

const SOURCE_BY_SWITCH_COMMAND: ReadonlyMap<PuckCommand, InputSource> = new Map([
  [PuckCommand.SWITCH_BLUETOOTH, InputSource.BLUETOOTH],
  [PuckCommand.SWITCH_AUX, InputSource.AUX],
  [PuckCommand.SWITCH_USB, InputSource.USB],
]);

const STEP_DELTAS: ReadonlyMap<PuckCommand, ['volumeSteps' | 'bassSteps', number]> =
  new Map<PuckCommand, ['volumeSteps' | 'bassSteps', number]>([
    [PuckCommand.VOLUME_UP, ['volumeSteps', 1]],
    [PuckCommand.VOLUME_DOWN, ['volumeSteps', -1]],
    [PuckCommand.BASS_UP, ['bassSteps', 1]],
    [PuckCommand.BASS_DOWN, ['bassSteps', -1]],
  ]);

export class PuckStateTracker {
  private inputSource: InputSource | null = null;
  private volumeSteps = 0;
  private bassSteps = 0;
  private lastEvent: PuckEvent | null = null;

  /**
   * Update the view from one decoded event.
   */
  apply(event: PuckEvent): void {
    this.lastEvent = event;

    if (event.category === 'switched') {
      this.inputSource = event.source;
      return;
    }

    if (event.category !== 'confirmation') {
      return;
    }

    const source = SOURCE_BY_SWITCH_COMMAND.get(event.command);
    if (source) {
      this.inputSource = source;
      return;
    }

    const delta = STEP_DELTAS.get(event.command);
    if (delta) {
      const [field, step] = delta;
      this[field] += step;
    }
  }

  /**
   * Forget everything. Called on connection loss.
   */
  reset(): void {
    this.inputSource = null;
    this.volumeSteps = 0;
    this.bassSteps = 0;
    this.lastEvent = null;
  }

  snapshot(): PuckStateSnapshot {
    return {
      inputSource: this.inputSource,
      volumeSteps: this.volumeSteps,
      bassSteps: this.bassSteps,
      lastEvent: this.lastEvent,
    };
  }
}
