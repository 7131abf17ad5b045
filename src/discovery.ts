/**
 * BLE discovery for the Z407 puck.
 *
 * The puck does not advertise its service UUID, so scanning is unfiltered
 * and peripherals are matched on their advertised name (or address).
 */

import type { Peripheral } from '@abandonware/noble';
import { BLEConnectionError, BLETimeoutError } from './exceptions';
import { DEVICE_NAME, SCAN_TIMEOUT_MS } from './protocol/constants';
import { loadNoble, type NobleModule } from './transport/noble';

export interface DiscoveryOptions {
  /** Advertised local name to match (default: "Logitech Z407") */
  name?: string;

  /** Peripheral address to match instead of the name */
  address?: string;

  /** Maximum time to wait for the adapter and the scan, in milliseconds */
  timeoutMs?: number;
}

/**
 * Scan for a puck and return the first match.
 *
 * @param options - Name/address filter and timeout
 * @returns The matching noble peripheral (not yet connected)
 * @throws {BLETimeoutError} If the adapter is not powered on or no puck is seen in time
 * @throws {BLEConnectionError} If scanning cannot be started
 *
 * @example
 * ```typescript
 * const peripheral = await discoverPuck();
 * // or by address:
 * const peripheral = await discoverPuck({ address: 'aa:bb:cc:dd:ee:ff' });
 * ```
 */
export async function discoverPuck(options: DiscoveryOptions = {}): Promise<Peripheral> {
  const noble = await loadNoble();
  const timeoutMs = options.timeoutMs ?? SCAN_TIMEOUT_MS;
  const address = options.address?.toLowerCase();
  const name = options.name ?? DEVICE_NAME;
  // One budget covers the adapter wait and the scan
  const deadline = Date.now() + timeoutMs;

  await waitForPoweredOn(noble, timeoutMs);

  const matches = (peripheral: Peripheral): boolean =>
    address !== undefined
      ? peripheral.address.toLowerCase() === address
      : peripheral.advertisement.localName === name;

  console.log(`Scanning for ${address ?? `'${name}'`}`);

  return new Promise<Peripheral>((resolve, reject) => {
    const finish = (): void => {
      clearTimeout(timeoutId);
      noble.removeListener('discover', onDiscover);
      noble.stopScanningAsync().catch((error: unknown) => {
        console.warn('Failed to stop scanning:', error);
      });
    };

    const onDiscover = (peripheral: Peripheral): void => {
      const localName = peripheral.advertisement.localName;
      if (localName) {
        console.debug(`Scanned device: ${localName} (${peripheral.address})`);
      }
      if (!matches(peripheral)) {
        return;
      }
      finish();
      console.log(`Found puck: ${localName || peripheral.address}`);
      resolve(peripheral);
    };

    const timeoutId = setTimeout(() => {
      finish();
      reject(new BLETimeoutError(`No puck found within ${timeoutMs}ms scan`));
    }, Math.max(0, deadline - Date.now()));

    noble.on('discover', onDiscover);
    noble.startScanningAsync([], false).catch((error: unknown) => {
      finish();
      const message = error instanceof Error ? error.message : String(error);
      reject(new BLEConnectionError(`Failed to start scanning: ${message}`));
    });
  });
}

function waitForPoweredOn(noble: NobleModule, timeoutMs: number): Promise<void> {
  if (noble._state === 'poweredOn') {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const onStateChange = (state: string): void => {
      if (state === 'poweredOn') {
        clearTimeout(timeoutId);
        noble.removeListener('stateChange', onStateChange);
        resolve();
      }
    };

    const timeoutId = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      reject(
        new BLETimeoutError(
          `Bluetooth adapter not powered on within ${timeoutMs}ms (state: ${noble._state})`
        )
      );
    }, timeoutMs);

    noble.on('stateChange', onStateChange);
  });
}
