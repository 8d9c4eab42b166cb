/**
 * Local rack exports
 */

export * from './runtime.js';
export * from './signals.js';
export * from './manager.js';
