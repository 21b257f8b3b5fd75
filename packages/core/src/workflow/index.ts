/**
 * Workflow definition loading
 */

export {
  parseWorkflow,
  loadWorkflow,
  loadWorkflowFromFile,
  createDefaultWorkflow,
} from './workflow-loader.js';
export type { WorkflowLoadOptions } from './workflow-loader.js';
