/**
 * Link exports.
 * @module links
 */
export * from './roles';
export * from './link';
