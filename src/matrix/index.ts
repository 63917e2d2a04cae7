/**
 * Matrix planning exports.
 */

export * from './cell';
export * from './expander';
export * from './identity';
export * from './override-filter';
export * from './parse';
export * from './planner';
export * from './registry';
export * from './schema';
export * from './validator';
