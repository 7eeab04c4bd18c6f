import { createContext, useContext, useState, useEffect, useCallback } from 'react';
import type { Tracker, TrackerSnapshot } from '../../lib/tracker/types';
import type { ProjectSummary } from '../../lib/store/types';
import { DEFAULT_TRACKER_SETTINGS } from '../../lib/config';

export interface TrackerContextValue {
  snapshot: TrackerSnapshot;
  projects: ProjectSummary[];
  adjustStepSeconds: number;
  toggle: () => void;
  reset: (confirm: () => boolean) => boolean;
  adjust: (deltaSeconds: number) => void;
  switchProject: (name: string) => boolean;
  selectCountdown: () => void;
}

export const TrackerContext = createContext<TrackerContextValue | null>(null);

export function useTrackerProvider(
  tracker: Tracker,
  settings = DEFAULT_TRACKER_SETTINGS,
): TrackerContextValue {
  const [snapshot, setSnapshot] = useState<TrackerSnapshot>(() => tracker.getSnapshot());
  const [projects, setProjects] = useState<ProjectSummary[]>(() => tracker.listProjects());

  // Intents change the project list as well as the timer
  useEffect(() => {
    setSnapshot(tracker.getSnapshot());
    setProjects(tracker.listProjects());
    return tracker.subscribe(() => {
      setSnapshot(tracker.getSnapshot());
      setProjects(tracker.listProjects());
    });
  }, [tracker]);

  // Refresh the live total every tick while running. Reads only.
  useEffect(() => {
    if (snapshot.status !== 'running') return;
    const id = setInterval(() => setSnapshot(tracker.getSnapshot()), settings.tickIntervalMs);
    return () => clearInterval(id);
  }, [tracker, snapshot.status, settings.tickIntervalMs]);

  const toggle = useCallback(() => tracker.toggle(), [tracker]);
  const reset = useCallback((confirm: () => boolean) => tracker.reset(confirm), [tracker]);
  const adjust = useCallback((deltaSeconds: number) => tracker.adjust(deltaSeconds), [tracker]);
  const switchProject = useCallback((name: string) => tracker.switchProject(name), [tracker]);
  const selectCountdown = useCallback(
    () => tracker.selectCountdown(settings.countdownSeconds),
    [tracker, settings.countdownSeconds],
  );

  return {
    snapshot,
    projects,
    adjustStepSeconds: settings.adjustStepSeconds,
    toggle,
    reset,
    adjust,
    switchProject,
    selectCountdown,
  };
}

export function useTracker(): TrackerContextValue {
  const ctx = useContext(TrackerContext);
  if (!ctx) {
    throw new Error('useTracker must be used within a TrackerContext provider');
  }
  return ctx;
}
