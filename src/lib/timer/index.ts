import type { TimerState, TimerStatus } from './types';

export type { TimerState, TimerStatus } from './types';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create a stopped timer holding `accumulatedSeconds` of banked time. */
export function createTimer(accumulatedSeconds = 0): TimerState {
  return {
    accumulatedSeconds: clampSeconds(accumulatedSeconds),
    isRunning: false,
    startedAt: null,
  };
}

// ---------------------------------------------------------------------------
// State transitions
// ---------------------------------------------------------------------------

/** Start the timer. No-op when already running. */
export function startTimer(state: TimerState, now: Date): TimerState {
  if (state.isRunning) return state;
  return {
    ...state,
    isRunning: true,
    startedAt: now.toISOString(),
  };
}

/** Stop the timer, folding the current run into the accumulated total. */
export function stopTimer(state: TimerState, now: Date): TimerState {
  if (!state.isRunning || state.startedAt === null) return state;
  return {
    accumulatedSeconds: state.accumulatedSeconds + runSeconds(state.startedAt, now),
    isRunning: false,
    startedAt: null,
  };
}

/**
 * Clear the accumulated total. A running timer keeps running, restarted from
 * zero at `now`; a stopped timer stays stopped.
 */
export function resetTimer(state: TimerState, now: Date): TimerState {
  return {
    accumulatedSeconds: 0,
    isRunning: state.isRunning,
    startedAt: state.isRunning ? now.toISOString() : null,
  };
}

/**
 * Stop the timer and shift the banked total by `deltaSeconds`.
 * The result never drops below zero.
 */
export function adjustTimer(state: TimerState, deltaSeconds: number, now: Date): TimerState {
  const stopped = stopTimer(state, now);
  if (!Number.isFinite(deltaSeconds)) return stopped;
  return {
    ...stopped,
    accumulatedSeconds: clampSeconds(stopped.accumulatedSeconds + deltaSeconds),
  };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Banked seconds plus the run in progress. Never negative. */
export function getCurrentTotal(state: TimerState, now: Date): number {
  if (!state.isRunning || state.startedAt === null) return state.accumulatedSeconds;
  return state.accumulatedSeconds + runSeconds(state.startedAt, now);
}

/** Seconds of the run in progress, or 0 when stopped. */
export function getSessionSeconds(state: TimerState, now: Date): number {
  if (!state.isRunning || state.startedAt === null) return 0;
  return runSeconds(state.startedAt, now);
}

/** Seconds left of a countdown of `durationSeconds`. Never negative. */
export function getRemainingSeconds(state: TimerState, durationSeconds: number, now: Date): number {
  return Math.max(0, durationSeconds - getCurrentTotal(state, now));
}

export function getTimerStatus(state: TimerState): TimerStatus {
  return state.isRunning ? 'running' : 'stopped';
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Seconds between an ISO timestamp and a Date. A clock that went backwards counts as 0. */
function runSeconds(isoString: string, now: Date): number {
  return Math.max(0, (now.getTime() - new Date(isoString).getTime()) / 1000);
}

function clampSeconds(seconds: number): number {
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}
