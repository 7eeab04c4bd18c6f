/** Possible timer statuses. */
export type TimerStatus = 'running' | 'stopped';

/** Serializable timer state. All dates are ISO 8601 strings. */
export interface TimerState {
  /** Seconds banked from completed runs, excluding the run in progress. */
  accumulatedSeconds: number;
  isRunning: boolean;
  /** Start of the run in progress; null whenever the timer is stopped. */
  startedAt: string | null;
}

