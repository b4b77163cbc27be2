/**
 * Connection core exports.
 * @module core
 */
export * from './constants';
export * from './errors';
export * from './SerialQueue';
export * from './LinkRegistry';
export * from './SessionGate';
export * from './DeviceProxy';
export * from './ConnectionHandler';
