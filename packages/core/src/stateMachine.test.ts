import { describe, it, expect } from 'vitest';
import { SessionStateMachine, getNextStates, isValidTransition } from './stateMachine.js';
import { StateTransitionError } from './errors/index.js';

describe('session transitions', () => {
  it('allows the restart cycle', () => {
    expect(isValidTransition('STARTING', 'RUNNING')).toBe(true);
    expect(isValidTransition('RUNNING', 'RESTARTING')).toBe(true);
    expect(isValidTransition('RESTARTING', 'STARTING')).toBe(true);
  });

  it('treats STOPPED as terminal', () => {
    expect(getNextStates('STOPPED')).toEqual([]);
  });

  it('rejects skipping the launch', () => {
    expect(isValidTransition('RESTARTING', 'RUNNING')).toBe(false);
  });
});

describe('SessionStateMachine', () => {
  it('records history and counts restarts', () => {
    const machine = new SessionStateMachine('s1');
    machine.transitionTo('RUNNING');
    machine.transitionTo('RESTARTING', 'exit 1');
    machine.transitionTo('STARTING');
    machine.transitionTo('RUNNING');
    machine.stop('cancelled');

    expect(machine.getState()).toBe('STOPPED');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.countTransitionsTo('RESTARTING')).toBe(1);
    expect(machine.getHistory().map(t => t.to)).toEqual([
      'RUNNING', 'RESTARTING', 'STARTING', 'RUNNING', 'STOPPED',
    ]);
  });

  it('throws on an invalid transition', () => {
    const machine = new SessionStateMachine('s2');
    machine.stop('cancelled');

    expect(() => machine.transitionTo('STARTING')).toThrow(StateTransitionError);
    expect(() => machine.transitionTo('STARTING')).toThrow(
      'Invalid state transition from STOPPED to STARTING'
    );
  });
});
