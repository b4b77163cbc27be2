/**
 * Per-connection link management for a device-facing protocol gateway.
 * @module link-gateway
 */
export * from './core';
export * from './identity';
export * from './links';
export * from './messages';
export * from './session';
