import { afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import { discoverPuck } from './discovery';
import { BLETimeoutError } from './exceptions';
import { loadNoble } from './transport/noble';

type Listener = (arg: unknown) => void;

const noble = vi.hoisted(() => {
  const listeners = new Map<string, Set<Listener>>();
  return {
    _state: 'poweredOff',
    on(event: string, listener: Listener) {
      const set = listeners.get(event) ?? new Set<Listener>();
      set.add(listener);
      listeners.set(event, set);
    },
    removeListener(event: string, listener: Listener) {
      listeners.get(event)?.delete(listener);
    },
    emit(event: string, arg: unknown) {
      for (const listener of [...(listeners.get(event) ?? [])]) {
        listener(arg);
      }
    },
    listenerCount(event: string): number {
      return listeners.get(event)?.size ?? 0;
    },
    reset() {
      listeners.clear();
    },
    startScanningAsync: vi.fn(async () => {}),
    stopScanningAsync: vi.fn(async () => {}),
  };
});

vi.mock('@abandonware/noble', () => ({ default: noble }));

function peripheral(address: string, localName?: string) {
  return { address, advertisement: { localName } };
}

describe('discoverPuck', () => {
  beforeAll(async () => {
    await loadNoble();
  });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    noble._state = 'poweredOn';
    noble.reset();
    noble.startScanningAsync.mockClear();
    noble.stopScanningAsync.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('resolves with the first peripheral advertising the puck name', async () => {
    const puck = peripheral('aa:bb:cc:dd:ee:ff', 'Logitech Z407');
    const found = discoverPuck();
    await vi.advanceTimersByTimeAsync(0);

    expect(noble.startScanningAsync).toHaveBeenCalledWith([], false);
    noble.emit('discover', peripheral('11:22:33:44:55:66', 'Headphones'));
    noble.emit('discover', peripheral('22:33:44:55:66:77'));
    noble.emit('discover', puck);

    await expect(found).resolves.toBe(puck);
    expect(noble.stopScanningAsync).toHaveBeenCalledTimes(1);
    expect(noble.listenerCount('discover')).toBe(0);
  });

  it('matches on address, ignoring case, when one is given', async () => {
    const target = peripheral('aa:bb:cc:dd:ee:ff');
    const found = discoverPuck({ address: 'AA:BB:CC:DD:EE:FF' });
    await vi.advanceTimersByTimeAsync(0);

    noble.emit('discover', peripheral('11:22:33:44:55:66', 'Logitech Z407'));
    noble.emit('discover', target);

    await expect(found).resolves.toBe(target);
  });

  it('rejects when the adapter never powers on', async () => {
    noble._state = 'poweredOff';
    const found = discoverPuck({ timeoutMs: 500 });
    const failure = expect(found).rejects.toThrow(
      'Bluetooth adapter not powered on within 500ms (state: poweredOff)'
    );

    await vi.advanceTimersByTimeAsync(500);
    await failure;
    expect(noble.startScanningAsync).not.toHaveBeenCalled();
    expect(noble.listenerCount('stateChange')).toBe(0);
  });

  it('shares one timeout between the adapter wait and the scan', async () => {
    noble._state = 'poweredOff';
    const found = discoverPuck({ timeoutMs: 1000 });
    const failure = expect(found).rejects.toBeInstanceOf(BLETimeoutError);

    await vi.advanceTimersByTimeAsync(600);
    noble._state = 'poweredOn';
    noble.emit('stateChange', 'poweredOn');
    await vi.advanceTimersByTimeAsync(0);
    expect(noble.startScanningAsync).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(399);
    expect(noble.stopScanningAsync).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await failure;
    await expect(found).rejects.toThrow('No puck found within 1000ms scan');
    expect(noble.stopScanningAsync).toHaveBeenCalledTimes(1);
  });
});
