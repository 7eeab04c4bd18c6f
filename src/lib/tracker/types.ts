import type { TimerStatus } from '../timer/types';
import type { ProjectStore, ProjectSummary } from '../store/types';

/** A project stopwatch, or the unsaved countdown. */
export type TrackerMode = 'stopwatch' | 'countdown';

/** What the presentation layer renders at a given moment. */
export interface TrackerSnapshot {
  mode: TrackerMode;
  /** Selected project, or null before one is chosen and during a countdown. */
  project: string | null;
  status: TimerStatus;
  /** Banked seconds plus the run in progress. */
  totalSeconds: number;
  /** Seconds of the run in progress, 0 when stopped. */
  sessionSeconds: number;
  accumulatedSeconds: number;
  /** Seconds left of the countdown; null in stopwatch mode. */
  remainingSeconds: number | null;
  /** True once a countdown has reached zero. */
  expired: boolean;
  /** Last persistence or input problem, cleared by the next successful save. */
  warning: string | null;
}

export interface TrackerOptions {
  store: ProjectStore;
  /** Project to select at startup. Defaults to the store's most recent one. */
  initialProject?: string | null;
  clock?: () => Date;
  /** Length of a countdown started without an explicit duration. */
  countdownSeconds?: number;
  onWarning?: (message: string) => void;
}

export type TrackerListener = () => void;

/**
 * Owns the timer for the selected project. Every mutation goes through one of
 * these intents; state-changing intents save to the store.
 */
export interface Tracker {
  getSnapshot(now?: Date): TrackerSnapshot;
  getCurrentTotal(now?: Date): number;
  start(): void;
  stop(): void;
  toggle(): void;
  /** Resets only when `confirm` returns true. Returns whether it reset. */
  reset(confirm: () => boolean): boolean;
  adjust(deltaSeconds: number): void;
  /** Returns false when the name is empty. */
  switchProject(name: string): boolean;
  /** Leave the current project (saving it) and arm a stopped countdown. */
  selectCountdown(durationSeconds?: number): void;
  shutdown(): void;
  listProjects(): ProjectSummary[];
  subscribe(listener: TrackerListener): () => void;
}
