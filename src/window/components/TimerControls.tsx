import { useTracker } from '../hooks/useTracker';

interface TimerControlsProps {
  /** Asks the user before a reset. Defaults to `window.confirm`. */
  confirm?: (message: string) => boolean;
}

export default function TimerControls({ confirm = (message) => window.confirm(message) }: TimerControlsProps) {
  const { snapshot, adjustStepSeconds, toggle, reset, adjust } = useTracker();
  const running = snapshot.status === 'running';
  const minutes = Math.round(adjustStepSeconds / 60);
  const disabled = snapshot.project === null && snapshot.mode !== 'countdown';
  const subject = snapshot.mode === 'countdown' ? 'countdown' : (snapshot.project ?? 'timer');

  const handleReset = () => {
    reset(() => confirm(`Reset "${subject}" to zero?`));
  };

  return (
    <section className="flex justify-center gap-3">
      <button
        onClick={toggle}
        disabled={disabled}
        className={`px-4 py-2 text-sm font-medium rounded-lg transition-colors ${
          running ? 'text-green-700 bg-green-50 hover:bg-green-100' : 'text-red-600 bg-red-50 hover:bg-red-100'
        }`}
      >
        {running ? 'Stop' : 'Start'}
      </button>
      <button
        onClick={() => adjust(adjustStepSeconds)}
        disabled={disabled}
        aria-label={`Add ${minutes} minute${minutes === 1 ? '' : 's'}`}
        className="px-3 py-2 text-sm rounded-lg bg-gray-100 hover:bg-gray-200"
      >
        +{minutes}m
      </button>
      <button
        onClick={() => adjust(-adjustStepSeconds)}
        disabled={disabled}
        aria-label={`Remove ${minutes} minute${minutes === 1 ? '' : 's'}`}
        className="px-3 py-2 text-sm rounded-lg bg-gray-100 hover:bg-gray-200"
      >
        -{minutes}m
      </button>
      <button
        onClick={handleReset}
        className="px-3 py-2 text-sm rounded-lg bg-gray-100 hover:bg-gray-200"
      >
        Reset
      </button>
    </section>
  );
}
