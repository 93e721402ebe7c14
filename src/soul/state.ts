import { AgentwireError } from '../errors.js';

export type SoulState =
  | 'idle'
  | 'awaiting_model'
  | 'executing_tools'
  | 'awaiting_approval'
  | 'completed'
  | 'failed'
  | 'interrupted';

const TRANSITIONS: Record<SoulState, readonly SoulState[]> = {
  idle: ['awaiting_model'],
  awaiting_model: ['executing_tools', 'completed', 'failed', 'interrupted'],
  executing_tools: ['awaiting_approval', 'awaiting_model', 'failed', 'interrupted'],
  awaiting_approval: ['executing_tools', 'failed', 'interrupted'],
  completed: ['idle'],
  failed: ['idle'],
  interrupted: ['idle'],
};

export function isTerminalState(s: SoulState): boolean {
  return s === 'completed' || s === 'failed' || s === 'interrupted';
}

export function canTransition(from: SoulState, to: SoulState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class IllegalTransitionError extends AgentwireError {
  constructor(
    readonly from: SoulState,
    readonly to: SoulState
  ) {
    super(`illegal soul transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Guards the turn lifecycle of one soul. */
export class SoulStateMachine {
  private current: SoulState = 'idle';
  private readonly history: SoulState[] = ['idle'];

  constructor(private readonly onChange?: (from: SoulState, to: SoulState) => void) {}

  get state(): SoulState {
    return this.current;
  }

  /** States visited since construction (bounded), oldest first. */
  get trail(): readonly SoulState[] {
    return this.history;
  }

  transition(to: SoulState): void {
    const from = this.current;
    if (!canTransition(from, to)) throw new IllegalTransitionError(from, to);
    this.current = to;
    this.history.push(to);
    if (this.history.length > 256) this.history.splice(0, this.history.length - 256);
    this.onChange?.(from, to);
  }
}
