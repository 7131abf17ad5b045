/**
 * noble-backed transport for the Z407 puck.
 *
 * Provides the two-characteristic interface the session needs:
 * - Command characteristic (write with response)
 * - Response characteristic (notify)
 * - Disconnect detection
 */

import type { Characteristic, Peripheral } from '@abandonware/noble';
import { BLEConnectionError } from '../exceptions';
import {
  COMMAND_CHARACTERISTIC_UUID,
  RESPONSE_CHARACTERISTIC_UUID,
  SERVICE_UUID,
} from '../protocol/constants';
import { toNobleUuid } from './noble';
import type { DisconnectHandler, NotificationHandler, PuckTransport } from './transport';

/**
 * GATT connection to one puck.
 *
 * Created with {@link NobleTransport.open} from a discovered peripheral.
 */
export class NobleTransport implements PuckTransport {
  private connected = true;
  private notificationHandler: NotificationHandler | null = null;
  private disconnectHandlers: DisconnectHandler[] = [];
  private readonly dataListener = (data: Buffer): void => this.handleNotification(data);
  private readonly disconnectListener = (): void => this.handleDisconnect();

  private constructor(
    private readonly peripheral: Peripheral,
    private readonly commandCharacteristic: Characteristic,
    private readonly responseCharacteristic: Characteristic
  ) {
    this.responseCharacteristic.on('data', this.dataListener);
    this.peripheral.once('disconnect', this.disconnectListener);
  }

  /**
   * Connect to a peripheral and discover the puck characteristics.
   *
   * @throws {BLEConnectionError} If connection or discovery fails
   */
  static async open(peripheral: Peripheral): Promise<NobleTransport> {
    const name = peripheral.advertisement.localName || peripheral.address;

    try {
      console.log(`Connecting to ${name}...`);
      await peripheral.connectAsync();

      const commandUuid = toNobleUuid(COMMAND_CHARACTERISTIC_UUID);
      const responseUuid = toNobleUuid(RESPONSE_CHARACTERISTIC_UUID);
      const { characteristics } =
        await peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [toNobleUuid(SERVICE_UUID)],
          [commandUuid, responseUuid]
        );

      const command = characteristics.find((c) => c.uuid === commandUuid);
      const response = characteristics.find((c) => c.uuid === responseUuid);
      if (!command || !response) {
        throw new BLEConnectionError(
          `Puck characteristics not found (command: ${Boolean(command)}, response: ${Boolean(response)})`
        );
      }

      console.log(`Connected to ${name}`);
      return new NobleTransport(peripheral, command, response);
    } catch (error) {
      try {
        await peripheral.disconnectAsync();
      } catch {
        // Already disconnected
      }
      if (error instanceof BLEConnectionError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BLEConnectionError(`Failed to connect: ${message}`);
    }
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new BLEConnectionError('Not connected to puck');
    }

    try {
      await this.commandCharacteristic.writeAsync(Buffer.from(data), false);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new BLEConnectionError(`Failed to write command: ${message}`);
    }
  }

  async subscribe(onNotify: NotificationHandler): Promise<void> {
    this.notificationHandler = onNotify;
    await this.responseCharacteristic.subscribeAsync();
  }

  onDisconnect(callback: DisconnectHandler): void {
    this.disconnectHandlers.push(callback);
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    try {
      try {
        await this.responseCharacteristic.unsubscribeAsync();
      } catch {
        // Ignore errors during cleanup
      }
      await this.peripheral.disconnectAsync();
    } finally {
      this.handleDisconnect();
    }
  }

  private handleNotification(data: Buffer): void {
    this.notificationHandler?.(new Uint8Array(data));
  }

  private handleDisconnect(): void {
    if (!this.connected) {
      return;
    }
    console.log('Puck disconnected');
    this.connected = false;
    this.responseCharacteristic.removeListener('data', this.dataListener);
    this.peripheral.removeListener('disconnect', this.disconnectListener);

    const handlers = this.disconnectHandlers;
    this.disconnectHandlers = [];
    for (const handler of handlers) {
      handler();
    }
  }
}
