/**
 * Promise-based waiting on puck events.
 *
 * Events are pushed to listeners as they arrive. This lets a caller register
 * interest in a future event (e.g. the confirmation of a command it is about
 * to send) and await it with a timeout.
 */

import { DisconnectedError } from '../exceptions';
import type { PuckEvent } from '../models/events';

interface PendingWaiter {
  matches: (event: PuckEvent) => boolean;
  resolve: (event: PuckEvent) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

/**
 * Handle for one registered wait.
 */
export interface PendingEvent<T extends PuckEvent> {
  promise: Promise<T>;

  /**
   * Stop waiting. The promise is left unsettled.
   */
  cancel(): void;
}

/**
 * Dispatches incoming events to waiters registered before they arrived.
 *
 * Events nobody waits for are not buffered: a confirmation that arrived
 * before the wait was registered cannot be told apart from one belonging
 * to an earlier command.
 */
export class EventWaiter {
  private pendingWaiters: PendingWaiter[] = [];

  /**
   * Offer an event to the waiters.
   *
   * Resolves the oldest waiter whose predicate matches, if any.
   *
   * @returns True if a waiter consumed the event
   */
  dispatch(event: PuckEvent): boolean {
    const index = this.pendingWaiters.findIndex((p) => p.matches(event));
    if (index === -1) {
      return false;
    }

    const [pending] = this.pendingWaiters.splice(index, 1);
    clearTimeout(pending.timeoutId);
    pending.resolve(event);
    return true;
  }

  /**
   * Wait for the next event accepted by `predicate`.
   *
   * @param predicate - Type guard selecting the event
   * @param timeoutMs - Maximum time to wait in milliseconds
   * @param onTimeout - Builds the rejection error when the timeout expires
   */
  waitFor<T extends PuckEvent>(
    predicate: (event: PuckEvent) => event is T,
    timeoutMs: number,
    onTimeout: () => Error
  ): PendingEvent<T> {
    let waiter: PendingWaiter | null = null;

    const promise = new Promise<T>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        if (waiter && this.remove(waiter)) {
          reject(onTimeout());
        }
      }, timeoutMs);

      waiter = {
        matches: predicate,
        resolve: (event) => {
          if (predicate(event)) {
            resolve(event);
          }
        },
        reject,
        timeoutId,
      };
      this.pendingWaiters.push(waiter);
    });

    return {
      promise,
      cancel: () => {
        if (waiter && this.remove(waiter)) {
          clearTimeout(waiter.timeoutId);
        }
      },
    };
  }

  /**
   * Reject all pending waiters with a {@link DisconnectedError}.
   *
   * Called when the connection is closed or lost.
   *
   * @param reason - Reason for clearing (default: "Connection closed")
   */
  clear(reason: string = 'Connection closed'): void {
    const waiters = this.pendingWaiters;
    this.pendingWaiters = [];

    for (const pending of waiters) {
      clearTimeout(pending.timeoutId);
      pending.reject(new DisconnectedError(reason));
    }
  }

  /**
   * Get the number of waiters still pending.
   */
  get pendingCount(): number {
    return this.pendingWaiters.length;
  }

  private remove(waiter: PendingWaiter): boolean {
    const index = this.pendingWaiters.indexOf(waiter);
    if (index === -1) {
      return false;
    }
    this.pendingWaiters.splice(index, 1);
    return true;
  }
}
