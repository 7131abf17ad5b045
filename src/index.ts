/**
 * z407-puck - TypeScript library for the Logitech Z407 BLE control puck
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { PuckDevice, type PuckDeviceOptions, type SoundCue } from './device';
export { discoverPuck, type DiscoveryOptions } from './discovery';

// Session layer
export { PuckSession, establishSession, type PuckSessionOptions } from './session/session';
export { HandshakeCoordinator, type HandshakeCoordinatorOptions } from './session/handshake-coordinator';
export { EventWaiter, type PendingEvent } from './session/event-waiter';

// Transport
export type { PuckTransport, NotificationHandler, DisconnectHandler } from './transport/transport';
export { NobleTransport } from './transport/noble-transport';

// Protocol codec
export * from './protocol';

// Models and types
export * from './models';

// Exceptions
export * from './exceptions';
