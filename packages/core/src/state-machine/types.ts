/**
 * State machine types
 */

import type { PipelineState } from '@pipewright/shared';

export interface StateChange {
  runId: string;
  from: PipelineState;
  to: PipelineState;
  reason: string;
  at: Date;
}

export interface StateMachineEvents {
  'state:changed': (change: StateChange) => void;
  'run:finished': (change: StateChange) => void;
}
