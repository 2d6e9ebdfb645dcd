/**
 * Manager protocol wire layer exports.
 * @module protocol
 */
export * from './constants';
export * from './errors';
export * from './fields';
export * from './message';
export * from './decoder';
export * from './classifier';
