import { describe, it, expect, vi } from 'vitest';

import { InvalidRunTransitionError } from '../errors.js';
import { canTransition, isTerminal, RunStateMachine } from '../pipeline/run-state.js';

describe('RunStateMachine', () => {
  it('should walk the happy path and record history', () => {
    const onChange = vi.fn();
    const machine = new RunStateMachine(onChange);

    machine.transition('segmenting');
    machine.transition('narrating');
    machine.transition('failover');
    machine.transition('narrating');
    machine.transition('synthesizing');
    machine.transition('complete');

    expect(machine.state).toBe('complete');
    expect(machine.history).toEqual([
      'idle',
      'segmenting',
      'narrating',
      'failover',
      'narrating',
      'synthesizing',
      'complete',
    ]);
    expect(onChange).toHaveBeenCalledTimes(6);
    expect(onChange).toHaveBeenLastCalledWith('complete', 'synthesizing');
  });

  it('should reject an illegal transition without changing state', () => {
    const machine = new RunStateMachine();

    expect(() => machine.transition('narrating')).toThrow(InvalidRunTransitionError);
    expect(machine.state).toBe('idle');
  });

  it('should allow failure from segmenting, narrating and failover only', () => {
    expect(canTransition('segmenting', 'failed')).toBe(true);
    expect(canTransition('narrating', 'failed')).toBe(true);
    expect(canTransition('failover', 'failed')).toBe(true);
    expect(canTransition('synthesizing', 'failed')).toBe(false);
    expect(canTransition('idle', 'failed')).toBe(false);
  });

  it('should allow cancellation only while narrating', () => {
    expect(canTransition('narrating', 'cancelled')).toBe(true);
    expect(canTransition('failover', 'cancelled')).toBe(false);
  });

  it('should treat complete, failed and cancelled as terminal', () => {
    expect(isTerminal('complete')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('cancelled')).toBe(true);
    expect(isTerminal('narrating')).toBe(false);
  });
});
