/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './events';
export * from './job';
export * from './matrix';
export * from './pipeline';
export * from './run';
