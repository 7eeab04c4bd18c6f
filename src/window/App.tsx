import { TrackerContext, useTrackerProvider } from './hooks/useTracker';
import type { Tracker } from '../lib/tracker/types';
import type { TrackerSettings } from '../lib/config';
import ProjectPicker from './components/ProjectPicker';
import TimerDisplay from './components/TimerDisplay';
import TimerControls from './components/TimerControls';
import WarningBanner from './components/WarningBanner';
import ExpiredBanner from './components/ExpiredBanner';

interface AppProps {
  tracker: Tracker;
  settings?: TrackerSettings;
  confirm?: (message: string) => boolean;
}

/**
 * The timer window. The host owns the tracker and calls `tracker.shutdown()`
 * when the window closes.
 */
export default function App({ tracker, settings, confirm }: AppProps) {
  const value = useTrackerProvider(tracker, settings);

  return (
    <TrackerContext.Provider value={value}>
      <div className="flex flex-col gap-4 p-4 bg-white">
        <ProjectPicker />
        <TimerDisplay />
        <ExpiredBanner />
        <TimerControls confirm={confirm} />
        <WarningBanner />
      </div>
    </TrackerContext.Provider>
  );
}
