import {
  adjustTimer,
  createTimer,
  getCurrentTotal,
  getRemainingSeconds,
  getSessionSeconds,
  getTimerStatus,
  resetTimer,
  startTimer,
  stopTimer,
} from '../timer/index';
import type { TimerState } from '../timer/types';
import { formatClock, formatHours } from '../timer/format';
import { DEFAULT_TRACKER_SETTINGS } from '../config';
import { isStoreError } from '../store/errors';
import type { Tracker, TrackerListener, TrackerOptions, TrackerSnapshot } from './types';

export type { Tracker, TrackerListener, TrackerMode, TrackerOptions, TrackerSnapshot } from './types';
export { startTicker } from './ticker';

const NO_PROJECT_WARNING = 'Select or create a project first.';
const EMPTY_NAME_WARNING = 'Project name is required.';

/** Shown by the hosts once a countdown reaches zero. */
export const EXPIRED_MESSAGE = "Time's up!";

export function createTracker(options: TrackerOptions): Tracker {
  const { store, onWarning } = options;
  const clock = options.clock ?? (() => new Date());
  const defaultCountdown = options.countdownSeconds ?? DEFAULT_TRACKER_SETTINGS.countdownSeconds;
  const listeners = new Set<TrackerListener>();

  let project: string | null = options.initialProject?.trim() || store.mostRecent();
  let timer: TimerState = createTimer(project === null ? 0 : store.load(project));
  let warning: string | null = null;
  /** Countdown length while in countdown mode, else null. Never saved. */
  let countdown: number | null = null;

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  function notify(): void {
    for (const listener of listeners) listener();
  }

  function warn(message: string): void {
    warning = message;
    console.warn(`[tracker] ${message}`);
    onWarning?.(message);
  }

  /** Save the banked total. A failed write only warns; the timer keeps going. */
  function persist(name: string, seconds: number, now: Date): void {
    try {
      store.save(name, seconds, now);
      warning = null;
    } catch (err: unknown) {
      if (!isStoreError(err)) throw err;
      warn(`Could not save "${name}": ${err.message}`);
    }
  }

  function logSession(sessionSeconds: number, now: Date): void {
    const status = getTimerStatus(timer);
    if (countdown !== null) {
      console.info(`[tracker] countdown: ${status}, remaining ${formatClock(getRemainingSeconds(timer, countdown, now))}`);
      return;
    }
    if (project === null) return;
    console.info(
      `[tracker] ${project}: ${status}, session ${formatHours(sessionSeconds)}h, total ${formatHours(getCurrentTotal(timer, now))}h`,
    );
  }

  /** Stop the timer and save the current project. A countdown is never saved. */
  function closeSession(now: Date): void {
    const session = getSessionSeconds(timer, now);
    const wasRunning = timer.isRunning;
    timer = stopTimer(timer, now);
    if (wasRunning) logSession(session, now);
    if (project !== null) persist(project, timer.accumulatedSeconds, now);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  function getSnapshot(now: Date = clock()): TrackerSnapshot {
    const remainingSeconds = countdown === null ? null : getRemainingSeconds(timer, countdown, now);
    return {
      mode: countdown === null ? 'stopwatch' : 'countdown',
      project,
      status: getTimerStatus(timer),
      totalSeconds: getCurrentTotal(timer, now),
      sessionSeconds: getSessionSeconds(timer, now),
      accumulatedSeconds: timer.accumulatedSeconds,
      remainingSeconds,
      expired: remainingSeconds === 0,
      warning,
    };
  }

  // -------------------------------------------------------------------------
  // Intents
  // -------------------------------------------------------------------------

  function start(): void {
    if (project === null && countdown === null) {
      warn(NO_PROJECT_WARNING);
      notify();
      return;
    }
    if (timer.isRunning) return;
    const now = clock();
    timer = startTimer(timer, now);
    logSession(0, now);
    notify();
  }

  function stop(): void {
    if (!timer.isRunning) return;
    closeSession(clock());
    notify();
  }

  function toggle(): void {
    if (timer.isRunning) {
      stop();
    } else {
      start();
    }
  }

  function reset(confirm: () => boolean): boolean {
    if (!confirm()) return false;
    const now = clock();
    timer = resetTimer(timer, now);
    if (project !== null) persist(project, 0, now);
    notify();
    return true;
  }

  function adjust(deltaSeconds: number): void {
    const now = clock();
    if (countdown !== null) {
      // Shifts the time left; the countdown restarts stopped from there.
      const shift = Number.isFinite(deltaSeconds) ? deltaSeconds : 0;
      countdown = Math.max(0, getRemainingSeconds(timer, countdown, now) + shift);
      timer = createTimer();
      notify();
      return;
    }
    if (project === null) {
      warn(NO_PROJECT_WARNING);
      notify();
      return;
    }
    timer = adjustTimer(timer, deltaSeconds, now);
    persist(project, timer.accumulatedSeconds, now);
    notify();
  }

  function switchProject(name: string): boolean {
    const next = name.trim();
    if (next.length === 0) {
      warn(EMPTY_NAME_WARNING);
      notify();
      return false;
    }
    if (next === project) return true;

    const now = clock();
    closeSession(now);

    countdown = null;
    const records = store.readAll();
    const record = Object.prototype.hasOwnProperty.call(records, next) ? records[next] : undefined;
    project = next;
    timer = createTimer(record?.seconds ?? 0);
    if (!record) persist(next, 0, now);
    notify();
    return true;
  }

  function selectCountdown(durationSeconds: number = defaultCountdown): void {
    closeSession(clock());
    project = null;
    countdown = Number.isFinite(durationSeconds) ? Math.max(0, durationSeconds) : defaultCountdown;
    timer = createTimer();
    notify();
  }

  function shutdown(): void {
    closeSession(clock());
    notify();
  }

  function subscribe(listener: TrackerListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  return {
    getSnapshot,
    getCurrentTotal: (now: Date = clock()) => getCurrentTotal(timer, now),
    start,
    stop,
    toggle,
    reset,
    adjust,
    switchProject,
    selectCountdown,
    shutdown,
    listProjects: () => store.list(),
    subscribe,
  };
}
