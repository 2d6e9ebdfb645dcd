/**
 * Convenience action layer exports.
 * @module actions
 */
export * from './builders';
export * from './event-list';
export * from './timeout';
export * from './AmiActions';
