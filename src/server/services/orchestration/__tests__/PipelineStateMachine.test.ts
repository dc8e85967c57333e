import { describe, it, expect } from 'vitest';
import { PipelineStateMachine, isTerminalState } from '../PipelineStateMachine.js';
import { InvalidStateTransitionError } from '../../../types/errors.js';
import type { PipelineState } from '../../../types/deep-search.js';

describe('PipelineStateMachine', () => {
  it('walks the linear lifecycle and reports each transition', () => {
    const seen: [PipelineState, PipelineState][] = [];
    const machine = new PipelineStateMachine((from, to) => seen.push([from, to]));

    for (const state of ['searching', 'fetching', 'analyzing', 'aggregating', 'done'] as const) {
      machine.transition(state);
    }

    expect(machine.state).toBe('done');
    expect(seen).toEqual([
      ['queried', 'searching'],
      ['searching', 'fetching'],
      ['fetching', 'analyzing'],
      ['analyzing', 'aggregating'],
      ['aggregating', 'done'],
    ]);
  });

  it('fails only from searching', () => {
    const machine = new PipelineStateMachine();
    expect(machine.canTransition('failed')).toBe(false);
    machine.transition('searching');
    machine.transition('failed');
    expect(machine.state).toBe('failed');
    expect(isTerminalState(machine.state)).toBe(true);
  });

  it('rejects skipped and backward transitions', () => {
    const machine = new PipelineStateMachine();
    expect(() => machine.transition('fetching')).toThrow(InvalidStateTransitionError);
    machine.transition('searching');
    machine.transition('fetching');
    expect(() => machine.transition('searching')).toThrow(InvalidStateTransitionError);
    expect(() => machine.transition('failed')).toThrow(InvalidStateTransitionError);
    expect(machine.state).toBe('fetching');
  });

  it('treats only done and failed as terminal', () => {
    expect(isTerminalState('done')).toBe(true);
    expect(isTerminalState('aggregating')).toBe(false);
    expect(isTerminalState('queried')).toBe(false);
  });
});
