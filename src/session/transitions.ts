import type { SessionState } from '../types/session.types.js';

export type TransitionTrigger = 'setup' | 'dispatch' | 'complete' | 'destroy';

/** Allowed transitions; a trigger missing from a state's row is ignored in that state. */
export const TRANSITIONS: Readonly<Record<SessionState, Partial<Record<TransitionTrigger, SessionState>>>> = {
  uninitialized: { setup: 'ready', destroy: 'destroyed' },
  ready: { dispatch: 'querying', destroy: 'destroyed' },
  querying: { dispatch: 'querying', complete: 'ready', destroy: 'destroyed' },
  destroyed: {},
};

export function nextState(state: SessionState, trigger: TransitionTrigger): SessionState | undefined {
  return TRANSITIONS[state][trigger];
}

export function accepts(state: SessionState, trigger: TransitionTrigger): boolean {
  return nextState(state, trigger) !== undefined;
}
