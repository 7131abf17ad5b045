/**
 * In-process stand-in for a puck behind a GATT connection.
 *
 * Records every write, answers writes from a response table (hex opcode ->
 * hex notifications, delivered synchronously), and can simulate write
 * failures and connection loss.
 */

import { fromHex, toHex } from '../src/protocol/hex';
import type {
  DisconnectHandler,
  NotificationHandler,
  PuckTransport,
} from '../src/transport/transport';

export const HANDSHAKE_RESPONSES: Readonly<Record<string, string[]>> = {
  '8405': ['d40501'],
  '8400': ['d40001', 'd40003'],
};

export interface FakePuckOptions {
  /** Notifications sent in reply to each written opcode */
  responses?: Readonly<Record<string, string[]>>;
}

export class FakePuck implements PuckTransport {
  readonly writes: Uint8Array[] = [];
  failWrites = false;
  disconnectCalls = 0;

  private readonly responses: Readonly<Record<string, string[]>>;
  private notificationHandler: NotificationHandler | null = null;
  private disconnectHandlers: DisconnectHandler[] = [];

  constructor(options: FakePuckOptions = {}) {
    this.responses = options.responses ?? HANDSHAKE_RESPONSES;
  }

  /**
   * Hex of every write so far, in order.
   */
  get written(): string[] {
    return this.writes.map((data) => toHex(data));
  }

  get isSubscribed(): boolean {
    return this.notificationHandler !== null;
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.failWrites) {
      throw new Error('GATT write failed');
    }
    this.writes.push(Uint8Array.from(data));

    for (const hex of this.responses[toHex(data)] ?? []) {
      this.notify(hex);
    }
  }

  async subscribe(onNotify: NotificationHandler): Promise<void> {
    this.notificationHandler = onNotify;
  }

  onDisconnect(callback: DisconnectHandler): void {
    this.disconnectHandlers.push(callback);
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
  }

  /**
   * Deliver a notification as if the puck had sent it.
   */
  notify(hex: string): void {
    if (!this.notificationHandler) {
      throw new Error('Notification sent before subscribe()');
    }
    this.notificationHandler(fromHex(hex));
  }

  /**
   * Simulate the link dropping.
   */
  dropConnection(): void {
    for (const handler of this.disconnectHandlers) {
      handler();
    }
  }
}
