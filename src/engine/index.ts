/**
 * Engine exports.
 */

export * from './backends';
export * from './build-runner';
export * from './dispatcher';
export * from './orchestrator';
export * from './report';
export * from './run-options';
export * from './state-machine';
