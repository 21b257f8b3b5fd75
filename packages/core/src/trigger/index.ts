/**
 * Trigger evaluation
 */

export { TriggerEvaluator } from './trigger-evaluator.js';
export { normalizeGitHubEvent } from './webhook-normalizer.js';
export type { WebhookNormalization } from './webhook-normalizer.js';
