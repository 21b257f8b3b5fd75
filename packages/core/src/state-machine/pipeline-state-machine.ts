/**
 * Pipeline State Machine
 * Tracks one run through IDLE → BUILDING → TESTING → SUCCEEDED/FAILED
 */

import { EventEmitter } from 'eventemitter3';
import { PIPELINE_STATES, logStateTransition, type PipelineState } from '@pipewright/shared';
import { transitionValidator } from './transitions.js';
import type { StateChange, StateMachineEvents } from './types.js';

export class PipelineStateMachine extends EventEmitter<StateMachineEvents> {
  private currentState: PipelineState = PIPELINE_STATES.IDLE;
  private history: StateChange[] = [];

  constructor(private readonly runId: string) {
    super();
  }

  /**
   * Get current state
   */
  getState(): PipelineState {
    return this.currentState;
  }

  /**
   * Transitions taken so far, oldest first
   */
  getHistory(): readonly StateChange[] {
    return this.history;
  }

  /**
   * Check if a run is in progress (not idle or terminal)
   */
  isActive(): boolean {
    return (
      this.currentState !== PIPELINE_STATES.IDLE &&
      !transitionValidator.isTerminalState(this.currentState)
    );
  }

  isTerminal(): boolean {
    return transitionValidator.isTerminalState(this.currentState);
  }

  /**
   * Move to a new state. Throws InvalidTransitionError for transitions not in the table.
   */
  transition(toState: PipelineState, reason: string): StateChange {
    const fromState = this.currentState;

    transitionValidator.validateTransition(fromState, toState);

    this.currentState = toState;
    const change: StateChange = { runId: this.runId, from: fromState, to: toState, reason, at: new Date() };
    this.history.push(change);

    logStateTransition(this.runId, fromState, toState, reason);
    this.emit('state:changed', change);

    if (transitionValidator.isTerminalState(toState)) {
      this.emit('run:finished', change);
    }

    return change;
  }
}
