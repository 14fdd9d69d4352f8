/**
 * Wrapper run states
 *
 * Idle → PreRun → Composing → Spawning → Running →
 *   {Completed | TimedOut | Interrupted | SpawnFailed} → PostRun → Done
 *
 * A pre-run abort goes straight from PreRun to PostRun.
 */

export enum WrapperState {
  IDLE = 'IDLE',
  PRE_RUN = 'PRE_RUN',
  COMPOSING = 'COMPOSING',
  SPAWNING = 'SPAWNING',
  RUNNING = 'RUNNING',
  COMPLETED = 'COMPLETED',
  TIMED_OUT = 'TIMED_OUT',
  INTERRUPTED = 'INTERRUPTED',
  SPAWN_FAILED = 'SPAWN_FAILED',
  POST_RUN = 'POST_RUN',
  DONE = 'DONE',
}

const TRANSITIONS: Readonly<Record<WrapperState, readonly WrapperState[]>> = {
  [WrapperState.IDLE]: [WrapperState.PRE_RUN],
  [WrapperState.PRE_RUN]: [WrapperState.COMPOSING, WrapperState.POST_RUN],
  [WrapperState.COMPOSING]: [WrapperState.SPAWNING, WrapperState.SPAWN_FAILED],
  [WrapperState.SPAWNING]: [WrapperState.RUNNING, WrapperState.SPAWN_FAILED],
  [WrapperState.RUNNING]: [
    WrapperState.COMPLETED,
    WrapperState.TIMED_OUT,
    WrapperState.INTERRUPTED,
    WrapperState.SPAWN_FAILED,
  ],
  [WrapperState.COMPLETED]: [WrapperState.POST_RUN],
  [WrapperState.TIMED_OUT]: [WrapperState.POST_RUN],
  [WrapperState.INTERRUPTED]: [WrapperState.POST_RUN],
  [WrapperState.SPAWN_FAILED]: [WrapperState.POST_RUN],
  [WrapperState.POST_RUN]: [WrapperState.DONE],
  // A finished wrapper may be run again
  [WrapperState.DONE]: [WrapperState.PRE_RUN],
};

export function isValidStateTransition(from: WrapperState, to: WrapperState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * States in which a child process may exist
 */
export function isActiveState(state: WrapperState): boolean {
  return state === WrapperState.SPAWNING || state === WrapperState.RUNNING;
}
