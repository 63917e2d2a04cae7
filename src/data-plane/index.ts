/**
 * Event publishing exports.
 */

export * from './publisher';
