/**
 * Run state machine
 *
 * idle -> segmenting -> narrating <-> failover -> synthesizing -> complete
 *
 * `failed` is terminal and reachable from segmenting, narrating and
 * failover. `cancelled` is terminal and reachable from narrating.
 */

import { InvalidRunTransitionError } from '../errors.js';

/**
 * Phase of one synthesis run
 */
export type RunState =
  | 'idle'
  | 'segmenting'
  | 'narrating'
  | 'failover'
  | 'synthesizing'
  | 'complete'
  | 'failed'
  | 'cancelled';

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  idle: ['segmenting'],
  segmenting: ['narrating', 'failed'],
  narrating: ['failover', 'synthesizing', 'failed', 'cancelled'],
  failover: ['narrating', 'failed'],
  synthesizing: ['complete'],
  complete: [],
  failed: [],
  cancelled: [],
};

/**
 * Whether a transition is legal
 */
export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Whether no further transition is possible
 */
export function isTerminal(state: RunState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Tracks the state of a single run
 */
export class RunStateMachine {
  private current: RunState = 'idle';
  private readonly visited: RunState[] = ['idle'];
  private readonly onChange: ((state: RunState, previous: RunState) => void) | undefined;

  constructor(onChange?: (state: RunState, previous: RunState) => void) {
    this.onChange = onChange;
  }

  get state(): RunState {
    return this.current;
  }

  /**
   * Every state entered, in order
   */
  get history(): readonly RunState[] {
    return this.visited;
  }

  /**
   * Move to the next state
   *
   * @throws InvalidRunTransitionError on an illegal transition
   */
  transition(to: RunState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new InvalidRunTransitionError(from, to);
    }
    this.current = to;
    this.visited.push(to);
    this.onChange?.(to, from);
  }
}
