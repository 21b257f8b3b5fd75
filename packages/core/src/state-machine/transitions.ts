/**
 * State transition definitions and validation
 */

import { PIPELINE_STATES, InvalidTransitionError, type PipelineState } from '@pipewright/shared';

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
}

// Valid state transitions
const VALID_TRANSITIONS: StateTransition[] = [
  // From IDLE
  { from: PIPELINE_STATES.IDLE, to: PIPELINE_STATES.BUILDING }, // run_started
  { from: PIPELINE_STATES.IDLE, to: PIPELINE_STATES.FAILED }, // setup_failed

  // From BUILDING
  { from: PIPELINE_STATES.BUILDING, to: PIPELINE_STATES.TESTING }, // build_succeeded
  { from: PIPELINE_STATES.BUILDING, to: PIPELINE_STATES.FAILED }, // build_failed

  // From TESTING
  { from: PIPELINE_STATES.TESTING, to: PIPELINE_STATES.SUCCEEDED }, // tests_passed
  { from: PIPELINE_STATES.TESTING, to: PIPELINE_STATES.FAILED }, // tests_failed

  // Terminal states have no outgoing transitions
];

export class TransitionValidator {
  private transitionMap: Map<PipelineState, StateTransition[]>;

  constructor() {
    this.transitionMap = new Map();

    for (const transition of VALID_TRANSITIONS) {
      const existing = this.transitionMap.get(transition.from) || [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  /**
   * Check if a transition is valid
   */
  isValidTransition(from: PipelineState, to: PipelineState): boolean {
    const transitions = this.transitionMap.get(from) || [];
    return transitions.some((t) => t.to === to);
  }

  /**
   * Get all valid transitions from a state
   */
  getValidTransitions(from: PipelineState): PipelineState[] {
    const transitions = this.transitionMap.get(from) || [];
    return transitions.map((t) => t.to);
  }

  /**
   * Validate and throw if invalid
   */
  validateTransition(from: PipelineState, to: PipelineState): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to, {
        state: from,
        validTransitions: this.getValidTransitions(from),
      });
    }
  }

  /**
   * Check if a state is terminal
   */
  isTerminalState(state: PipelineState): boolean {
    return state === PIPELINE_STATES.SUCCEEDED || state === PIPELINE_STATES.FAILED;
  }
}

// Singleton instance
export const transitionValidator = new TransitionValidator();
