/**
 * Healing orchestrator state machine
 * Enforces valid transitions between orchestrator states
 */

import { InvalidTransitionError } from '../types/errors.js';
import type { OrchestratorState, TerminalState } from '../types/report.js';

/**
 * Valid state transitions map
 * Each key maps to an array of valid target states
 */
const VALID_TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
  Idle: ['Detecting'],
  Detecting: ['Diagnosing', 'Aborted'],
  Diagnosing: ['Healing'],
  Healing: ['Validating', 'Aborted'],
  Validating: ['Diagnosing', 'Resolved', 'PartialFailure', 'Escalated', 'Aborted'],
  Resolved: ['Reported'],
  PartialFailure: ['Reported'],
  Escalated: ['Reported'],
  Aborted: ['Reported'],
  Reported: [],
};

const TERMINAL_STATES: ReadonlySet<OrchestratorState> = new Set<OrchestratorState>([
  'Resolved',
  'PartialFailure',
  'Escalated',
  'Aborted',
]);

/**
 * Check if a transition from current to target is valid
 */
export function canTransition(current: OrchestratorState, target: OrchestratorState): boolean {
  return VALID_TRANSITIONS[current].includes(target);
}

/**
 * Validate a state transition
 *
 * @returns The new state
 * @throws InvalidTransitionError if the transition is invalid
 */
export function transitionState(current: OrchestratorState, target: OrchestratorState): OrchestratorState {
  if (!canTransition(current, target)) {
    throw new InvalidTransitionError('orchestrator state', current, target, getAvailableTransitions(current));
  }
  return target;
}

/**
 * Get the list of valid next states from the current state
 */
export function getAvailableTransitions(current: OrchestratorState): OrchestratorState[] {
  return VALID_TRANSITIONS[current];
}

export function isTerminalState(state: OrchestratorState): state is TerminalState {
  return TERMINAL_STATES.has(state);
}

export interface LoopDecisionInput {
  /** Problems that appeared during the latest validating pass */
  newIssues: number;
  /** Open critical issues after the latest validating pass */
  openCritical: number;
  /** Open issues above warning after the latest validating pass */
  openAboveWarning: number;
  /** Fixes that lost a collision this pass and are still open */
  pendingRetries: number;
  validationSucceeded: boolean;
  iteration: number;
  maxIterations: number;
}

/**
 * Where to go after a validating pass.
 */
export function decideAfterValidation(input: LoopDecisionInput): 'Diagnosing' | 'Resolved' | 'PartialFailure' | 'Escalated' {
  const needsAnotherPass = input.newIssues > 0 || input.openCritical > 0;
  if (needsAnotherPass) {
    return input.iteration < input.maxIterations ? 'Diagnosing' : 'Escalated';
  }
  if (input.pendingRetries > 0 && input.iteration < input.maxIterations) return 'Diagnosing';
  if (input.validationSucceeded && input.openAboveWarning === 0) return 'Resolved';
  return 'PartialFailure';
}
