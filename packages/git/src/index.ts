/**
 * @pipewright/git
 * Workspace checkout for Pipewright
 */

export * from './types.js';
export * from './client/local-git-client.js';
export * from './checkout-service.js';
