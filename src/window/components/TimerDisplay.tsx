import { useTracker } from '../hooks/useTracker';
import { formatClock, formatHours } from '../../lib/timer/format';

export default function TimerDisplay() {
  const { snapshot } = useTracker();
  const running = snapshot.status === 'running';
  const state = running ? 'running' : 'stopped';

  if (snapshot.remainingSeconds !== null) {
    return (
      <section className="text-center" aria-label="Time">
        <p className="text-4xl font-mono font-bold text-gray-900" data-testid="remaining-clock">
          {formatClock(snapshot.remainingSeconds)}
        </p>
        <p className="text-sm text-gray-500">{`Countdown (${state})`}</p>
      </section>
    );
  }

  return (
    <section className="text-center" aria-label="Time">
      <p className="text-4xl font-mono font-bold text-gray-900" data-testid="total-clock">
        {formatClock(snapshot.totalSeconds)}
      </p>
      <p className="text-sm text-gray-500">
        {snapshot.project === null
          ? 'No project selected'
          : `${snapshot.project} (${state})`}
      </p>
      <dl className="flex justify-center gap-4 text-xs text-gray-500 mt-2">
        <div>
          <dt className="inline">Session </dt>
          <dd className="inline font-mono" data-testid="session-clock">
            {formatClock(snapshot.sessionSeconds)}
          </dd>
        </div>
        <div>
          <dt className="inline">Total (h) </dt>
          <dd className="inline font-mono" data-testid="total-hours">
            {formatHours(snapshot.totalSeconds)}
          </dd>
        </div>
      </dl>
    </section>
  );
}
