/**
 * Security module exports
 */

export * from './errors.js';
export * from './validation.js';
export * from './auth.js';
