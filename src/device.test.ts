import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { FakePuck, HANDSHAKE_RESPONSES } from '../test/fake-puck';
import { PuckDevice } from './device';
import {
  ConfirmationTimeoutError,
  DisconnectedError,
  HandshakeTimeoutError,
  PuckError,
} from './exceptions';
import { InputSource, PuckCommand, PuckEventType } from './models/enums';
import type { PuckEvent } from './models/events';

describe('PuckDevice', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('connects through an injected transport', async () => {
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });

    expect(device.isConnected).toBe(false);
    expect(device.handshakeState).toEqual({ phase: 'idle' });

    await device.connect();

    expect(device.isConnected).toBe(true);
    expect(device.handshakeState).toEqual({ phase: 'ready' });
    expect(puck.written).toEqual(['8405', '8400']);
  });

  it('refuses to connect twice', async () => {
    const device = new PuckDevice({ transport: new FakePuck() });
    await device.connect();
    await expect(device.connect()).rejects.toThrow(PuckError);
  });

  it('rejects a second connect while the first is in flight', async () => {
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });

    const first = device.connect();
    await expect(device.connect()).rejects.toThrow('Connection already in progress');
    await first;

    expect(device.isConnected).toBe(true);
    expect(puck.written).toEqual(['8405', '8400']);
    expect(puck.disconnectCalls).toBe(0);
  });

  it('keeps delivering when a listener throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });
    const second = vi.fn();
    device.onEvent(() => {
      throw new Error('listener broke');
    });
    device.onEvent(second);
    await device.connect();

    puck.notify('c002');

    expect(second).toHaveBeenCalledTimes(1);
    expect(device.state.volumeSteps).toBe(1);
  });

  it('maps the convenience methods to opcodes', async () => {
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });
    await device.connect();

    await device.volumeUp();
    await device.volumeDown();
    await device.bassUp();
    await device.bassDown();
    await device.playPause();
    await device.nextTrack();
    await device.previousTrack();
    await device.switchInput(InputSource.BLUETOOTH);
    await device.switchInput(InputSource.AUX);
    await device.switchInput(InputSource.USB);
    await device.playSound(1);
    await device.playSound(2);
    await device.playSound(3);
    await device.enterPairing();
    await device.factoryReset();

    expect(puck.written.slice(2)).toEqual([
      '8002', '8003', '8000', '8001', '8004', '8005', '8006',
      '8101', '8102', '8103',
      '8501', '8502', '8503',
      '8200', '8300',
    ]);
  });

  it('rejects commands when not connected', async () => {
    const device = new PuckDevice({ transport: new FakePuck() });
    await expect(device.volumeUp()).rejects.toBeInstanceOf(DisconnectedError);
  });

  it('forwards events to listeners and tracks state', async () => {
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });
    const events: PuckEvent[] = [];
    device.onEvent((event) => events.push(event));
    await device.connect();

    puck.notify('c102');
    puck.notify('cf05');
    puck.notify('c002');

    expect(events.map((e) => e.type)).toEqual([
      PuckEventType.SWITCH_AUX,
      PuckEventType.SWITCHED_AUX,
      PuckEventType.VOLUME_UP,
    ]);
    expect(device.state.inputSource).toBe(InputSource.AUX);
    expect(device.state.volumeSteps).toBe(1);
  });

  it('forgets tracked state when the connection drops', async () => {
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });
    await device.connect();
    puck.notify('c103');

    puck.dropConnection();

    expect(device.isConnected).toBe(false);
    expect(device.state.inputSource).toBeNull();
    await expect(device.playPause()).rejects.toBeInstanceOf(DisconnectedError);
  });

  it('disconnects the transport', async () => {
    const puck = new FakePuck();
    const device = new PuckDevice({ transport: puck });
    await device.connect();

    await device.disconnect();

    expect(puck.disconnectCalls).toBe(1);
    expect(device.isConnected).toBe(false);
    await expect(device.volumeUp()).rejects.toThrow('Not connected to puck');
  });

  it('tears down the transport when the handshake fails', async () => {
    vi.useFakeTimers();
    const puck = new FakePuck({ responses: {} });
    const device = new PuckDevice({ transport: puck, handshakeTimeoutMs: 200 });
    const failure = expect(device.connect()).rejects.toBeInstanceOf(HandshakeTimeoutError);

    await vi.advanceTimersByTimeAsync(200);
    await failure;

    expect(puck.disconnectCalls).toBe(1);
    expect(device.isConnected).toBe(false);
  });

  describe('sendAndConfirm', () => {
    it('resolves with the confirmation event', async () => {
      const puck = new FakePuck({
        responses: { ...HANDSHAKE_RESPONSES, '8503': ['c501'] },
      });
      const device = new PuckDevice({ transport: puck });
      await device.connect();

      const event = await device.sendAndConfirm(PuckCommand.SOUND_3);

      expect(event?.type).toBe(PuckEventType.SOUND_3);
      expect(event?.command).toBe(PuckCommand.SOUND_3);
    });

    it('resolves when the confirmation arrives after the write', async () => {
      const puck = new FakePuck();
      const device = new PuckDevice({ transport: puck });
      await device.connect();

      const confirming = device.sendAndConfirm(PuckCommand.NEXT_TRACK, 1000);
      await vi.waitFor(() => expect(puck.written).toHaveLength(3));
      puck.notify('c004');
      puck.notify('c005');

      await expect(confirming).resolves.toMatchObject({
        category: 'confirmation',
        command: PuckCommand.NEXT_TRACK,
      });
    });

    it('rejects with ConfirmationTimeoutError when the puck stays silent', async () => {
      const puck = new FakePuck();
      const device = new PuckDevice({ transport: puck });
      await device.connect();
      vi.useFakeTimers();

      const confirming = device.sendAndConfirm(PuckCommand.VOLUME_UP, 300);
      const failure = expect(confirming).rejects.toMatchObject({
        name: 'ConfirmationTimeoutError',
        command: PuckCommand.VOLUME_UP,
      });

      await vi.advanceTimersByTimeAsync(300);
      await failure;
      await expect(confirming).rejects.toBeInstanceOf(ConfirmationTimeoutError);
    });

    it('rejects with the write error and leaves no waiter behind', async () => {
      const puck = new FakePuck();
      const device = new PuckDevice({ transport: puck });
      await device.connect();
      puck.failWrites = true;

      await expect(device.sendAndConfirm(PuckCommand.PAIRING)).rejects.toThrow(
        'Failed to write PAIRING: GATT write failed'
      );
      expect(device.isConnected).toBe(false);
    });

    it('returns undefined for commands the puck never confirms', async () => {
      const puck = new FakePuck();
      const device = new PuckDevice({ transport: puck });
      await device.connect();

      await expect(device.sendAndConfirm(PuckCommand.INITIATE)).resolves.toBeUndefined();
      expect(puck.written).toEqual(['8405', '8400', '8405']);
    });

    it('rejects when not connected', async () => {
      const device = new PuckDevice({ transport: new FakePuck() });

      await expect(device.sendAndConfirm(PuckCommand.VOLUME_UP)).rejects.toThrow(
        'Not connected to puck'
      );
    });
  });
});
