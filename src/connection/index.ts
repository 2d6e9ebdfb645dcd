/**
 * Transport establishment and login exports.
 * @module connection
 */
export * from './connect';
