/**
 * Pipeline State Machine
 *
 * States: IDLE → BUILDING → TESTING → SUCCEEDED/FAILED
 */

export { PipelineStateMachine } from './pipeline-state-machine.js';
export { TransitionValidator, transitionValidator } from './transitions.js';
export type { StateTransition } from './transitions.js';
export type { StateChange, StateMachineEvents } from './types.js';
