/**
 * Message exports.
 * @module messages
 */
export * from './message';
export * from './method';
