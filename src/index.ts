/*
 * Tagged Value - Main Entry Point
 *
 * A 64-bit tagged value cell for a dynamically typed runtime's value
 * stack, with kind dispatch and numeric addition over it.
 */

export * from './runtime';
