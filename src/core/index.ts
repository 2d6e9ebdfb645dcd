/**
 * Correlation engine exports.
 * @module core
 */
export * from './lifecycle';
export * from './logger';
export * from './AmiClient';
