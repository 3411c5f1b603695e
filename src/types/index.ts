/**
 * Type exports
 */

export * from './declarations.js';
export * from './diagnostics.js';
