/**
 * Turn states and the moves allowed between them.
 */

import { InvalidTransitionError } from '../errors.js';

export type TurnState =
  | 'idle'
  | 'routing'
  | 'awaiting_provider'
  | 'interpreting_response'
  | 'executing_tools'
  | 'compacting'
  | 'snapshotting'
  | 'terminated'
  | 'fatal';

export const TURN_STATES: readonly TurnState[] = [
  'idle',
  'routing',
  'awaiting_provider',
  'interpreting_response',
  'executing_tools',
  'compacting',
  'snapshotting',
  'terminated',
  'fatal',
];

/**
 * `idle` is the only place a turn starts. Every working state may fall back to
 * `idle` on interrupt and may be cut short by `terminated`. `fatal` is only
 * reachable from states that talk to the provider.
 */
export const TRANSITIONS: Readonly<Record<TurnState, readonly TurnState[]>> = {
  idle: ['routing', 'terminated'],
  routing: ['awaiting_provider', 'idle', 'terminated', 'fatal'],
  awaiting_provider: ['interpreting_response', 'compacting', 'idle', 'terminated', 'fatal'],
  interpreting_response: ['executing_tools', 'compacting', 'snapshotting', 'idle', 'terminated'],
  executing_tools: ['awaiting_provider', 'compacting', 'snapshotting', 'idle', 'terminated'],
  compacting: ['awaiting_provider', 'snapshotting', 'idle', 'terminated', 'fatal'],
  snapshotting: ['idle', 'terminated'],
  terminated: [],
  fatal: [],
};

export function isTerminalState(state: TurnState): boolean {
  return state === 'terminated' || state === 'fatal';
}

export type TransitionListener = (from: TurnState, to: TurnState) => void;

export class TurnStateMachine {
  private current: TurnState = 'idle';
  private readonly listener: TransitionListener | undefined;

  constructor(listener?: TransitionListener) {
    this.listener = listener;
  }

  get state(): TurnState {
    return this.current;
  }

  canTransition(to: TurnState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  /** @throws InvalidTransitionError when the table has no such move */
  transition(to: TurnState): void {
    const from = this.current;
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;
    this.listener?.(from, to);
  }
}
