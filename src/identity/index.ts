/**
 * Identity exports.
 * @module identity
 */
export * from './identity';
