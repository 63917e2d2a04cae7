/**
 * Pipeline exports.
 */

export * from './parse';
export * from './runner';
export * from './validator';
