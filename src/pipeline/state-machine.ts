/**
 * Pipeline state machine
 *
 *   INIT → INDEXED → EXTRACTING → AGGREGATED → DONE
 *
 * FAILED is reachable from every state except DONE. Only transitions in
 * the table are accepted.
 */

export type PipelineState = 'INIT' | 'INDEXED' | 'EXTRACTING' | 'AGGREGATED' | 'DONE' | 'FAILED';

export const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  INIT: ['INDEXED', 'FAILED'],
  INDEXED: ['EXTRACTING', 'FAILED'],
  EXTRACTING: ['AGGREGATED', 'FAILED'],
  AGGREGATED: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export interface Transition {
  from: PipelineState;
  to: PipelineState;
  /** Milliseconds since the machine was created */
  at: number;
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: PipelineState,
    readonly to: PipelineState
  ) {
    super(`Illegal pipeline transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class PipelineStateMachine {
  private current: PipelineState = 'INIT';
  private readonly transitions: Transition[] = [];
  private readonly startedAt: number;

  constructor(
    private readonly onTransition?: (transition: Transition) => void,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly Transition[] {
    return this.transitions;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: PipelineState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  /**
   * @throws IllegalTransitionError when `to` is not reachable from the current state
   */
  transition(to: PipelineState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    const transition = { from: this.current, to, at: this.now() - this.startedAt };
    this.current = to;
    this.transitions.push(transition);
    this.onTransition?.(transition);
  }
}
