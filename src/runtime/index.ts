/*
 * Tagged Value Runtime - Module Exports
 */

export * from './config';
export * from './errors';
export * from './typeId';
export * from './values';
export * from './dispatch';
export * from './cell';
export * from './instructions';
