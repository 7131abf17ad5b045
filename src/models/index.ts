/**
 * Models layer exports for Z407 puck structures.
 */

export * from './enums';
export * from './events';
export * from './handshake';
export * from './puck-state';
