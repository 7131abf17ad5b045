/**
 * Transport contract consumed by the puck session.
 *
 * A transport wraps one open GATT connection to the puck: the command
 * characteristic (write) and the response characteristic (notify).
 * Scanning and connecting happen before a transport is handed to a session.
 */

export type NotificationHandler = (data: Uint8Array) => void;

export type DisconnectHandler = () => void;

export interface PuckTransport {
  /**
   * Write a 2-byte opcode to the command characteristic.
   *
   * @throws {Error} If the connection is gone or the write fails
   */
  write(data: Uint8Array): Promise<void>;

  /**
   * Register the handler for response-characteristic notifications.
   * Notifications must be enabled once this resolves.
   */
  subscribe(onNotify: NotificationHandler): Promise<void>;

  /**
   * Register a callback for connection loss.
   */
  onDisconnect(callback: DisconnectHandler): void;

  /**
   * Close the connection. Safe to call when already disconnected.
   */
  disconnect(): Promise<void>;
}
