/**
 * Core types for Pipewright
 */

export * from './trigger.js';
export * from './pipeline.js';
export * from './cache.js';
