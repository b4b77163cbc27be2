/**
 * Session contract exports.
 * @module session
 */
export * from './types';
