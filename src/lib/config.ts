/** Fixed name of the data file kept beside the program. */
export const DATA_FILE_NAME = 'projects_data.json';

export interface TrackerSettings {
  /** Redisplay interval for the live total. */
  tickIntervalMs: number;
  /** Step used by the +/- buttons and keys. */
  adjustStepSeconds: number;
  /** Length of a fresh countdown. */
  countdownSeconds: number;
}

/** Default tracker settings. */
export const DEFAULT_TRACKER_SETTINGS: TrackerSettings = {
  tickIntervalMs: 1000,
  adjustStepSeconds: 60,
  countdownSeconds: 3600,
};
