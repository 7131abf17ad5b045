/**
 * Lazy access to @abandonware/noble.
 *
 * noble binds to the host Bluetooth adapter as soon as it is loaded, so it is
 * only imported when a scan or connection is actually requested. The
 * protocol and session layers stay importable on machines without an adapter.
 */

export type NobleModule = typeof import('@abandonware/noble');

let nobleModule: Promise<NobleModule> | null = null;

export function loadNoble(): Promise<NobleModule> {
  if (!nobleModule) {
    nobleModule = import('@abandonware/noble').then(
      (mod: NobleModule & { default?: NobleModule }) => mod.default ?? mod
    );
  }
  return nobleModule;
}

const BLUETOOTH_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

/**
 * Convert a canonical UUID to the form noble reports.
 *
 * noble uses lowercase UUIDs without dashes, and shortens UUIDs on the
 * Bluetooth base to 16 bits ("0000fdc2-0000-1000-8000-00805f9b34fb" -> "fdc2").
 */
export function toNobleUuid(uuid: string): string {
  const compact = uuid.replace(/-/g, '').toLowerCase();
  if (compact.startsWith('0000') && compact.endsWith(BLUETOOTH_BASE_UUID_SUFFIX)) {
    return compact.substring(4, 8);
  }
  return compact;
}
