/**
 * Protocol layer exports for Z407 puck BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './notifications';
export * from './hex';
