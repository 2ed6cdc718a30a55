import type { ExecutionState } from '../types/index.js';

const TRANSITIONS: Record<ExecutionState, readonly ExecutionState[]> = {
  INIT: ['NAVIGATED', 'FAILED'],
  NAVIGATED: ['STARTED', 'PAGE', 'FAILED'],
  STARTED: ['PAGE', 'FAILED'],
  PAGE: ['PAGE', 'RESULTS', 'FAILED'],
  RESULTS: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export interface StateChange {
  from: ExecutionState;
  to: ExecutionState;
  pageNumber?: number;
}

export class IllegalTransitionError extends Error {
  constructor(from: ExecutionState, to: ExecutionState) {
    super(`Illegal execution state transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * INIT -> NAVIGATED -> (STARTED) -> PAGE(1..N) -> RESULTS -> DONE,
 * with FAILED reachable from every non-terminal state.
 */
export class ExecutionStateMachine {
  private current: ExecutionState = 'INIT';
  private page: number | undefined;
  private readonly changes: StateChange[] = [];

  constructor(private onChange?: (change: StateChange) => void) {}

  get state(): ExecutionState {
    return this.current;
  }

  get pageNumber(): number | undefined {
    return this.page;
  }

  get history(): readonly StateChange[] {
    return this.changes;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: ExecutionState, pageNumber?: number): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    const change: StateChange = { from: this.current, to, pageNumber };
    this.current = to;
    this.page = to === 'PAGE' ? pageNumber : this.page;
    this.changes.push(change);
    this.onChange?.(change);
  }

  /**
   * Moves to FAILED unless already terminal. Returns whether it moved.
   */
  fail(): boolean {
    if (this.isTerminal) return false;
    this.transition('FAILED', this.page);
    return true;
  }
}
