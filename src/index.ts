/**
 * ami-link: client for the line-based manager protocol.
 * @module ami-link
 */
export * from './protocol';
export * from './core';
export * from './actions';
export * from './connection';
