/**
 * Artifact routing exports.
 */

export * from './artifact-spec';
export * from './channels';
export * from './fs-utils';
export * from './naming';
export * from './primitives';
export * from './router';
