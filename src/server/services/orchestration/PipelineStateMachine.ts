import type { PipelineState } from '../../types/deep-search.js';
import { InvalidStateTransitionError } from '../../types/errors.js';

const TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  queried: ['searching'],
  searching: ['fetching', 'failed'],
  fetching: ['analyzing'],
  analyzing: ['aggregating'],
  aggregating: ['done'],
  done: [],
  failed: [],
};

export function isTerminalState(state: PipelineState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Linear pipeline lifecycle; `failed` is reachable only while searching
 */
export class PipelineStateMachine {
  private current: PipelineState = 'queried';

  constructor(private readonly onTransition?: (from: PipelineState, to: PipelineState) => void) {}

  get state(): PipelineState {
    return this.current;
  }

  canTransition(to: PipelineState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  /**
   * @throws InvalidStateTransitionError when `to` is not reachable from the current state
   */
  transition(to: PipelineState): void {
    if (!this.canTransition(to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.onTransition?.(from, to);
  }
}
