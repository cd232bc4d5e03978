/**
 * Stream Session State Machine
 * 
 * Strict state machine for the supervised encoder lifecycle.
 * 
 * State Flow:
 * STARTING → RUNNING → RESTARTING → STARTING → ...
 *        ↘ STOPPED (cancelled, or restart ceiling reached)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - STOPPED is terminal
 */

import { StateTransitionError } from './errors/index.js';

export const SESSION_STATES = ['STARTING', 'RUNNING', 'RESTARTING', 'STOPPED'] as const;

export type SessionState = typeof SESSION_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface SessionStateTransition {
  from: SessionState;
  to: SessionState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<SessionState, ReadonlySet<SessionState>> = {
  STARTING: new Set<SessionState>([
    'RUNNING',
    'RESTARTING', // Launch failed before the process came up
    'STOPPED',
  ]),
  RUNNING: new Set<SessionState>([
    'RESTARTING',
    'STOPPED',
  ]),
  RESTARTING: new Set<SessionState>([
    'STARTING',
    'STOPPED',
  ]),
  STOPPED: new Set<SessionState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: SessionState, to: SessionState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: SessionState): SessionState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Session State Machine class
 * Manages state transitions with validation
 */
export class SessionStateMachine {
  private currentState: SessionState;
  private history: SessionStateTransition[];
  private readonly sessionId: string;

  constructor(sessionId: string, initialState: SessionState = 'STARTING') {
    this.sessionId = sessionId;
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): SessionState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<SessionStateTransition> {
    return [...this.history];
  }

  /**
   * Count how many times the machine entered a state
   */
  countTransitionsTo(state: SessionState): number {
    return this.history.filter(transition => transition.to === state).length;
  }

  /**
   * Check if a transition to the target state is valid
   */
  canTransitionTo(targetState: SessionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: SessionState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): SessionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.sessionId, this.currentState, targetState);
    }

    const transition: SessionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Check if the session has stopped
   */
  isTerminal(): boolean {
    return this.currentState === 'STOPPED';
  }

  /**
   * Stop the session with a reason
   */
  stop(reason: string, metadata?: Record<string, unknown>): SessionStateTransition {
    return this.transitionTo('STOPPED', reason, metadata);
  }
}
