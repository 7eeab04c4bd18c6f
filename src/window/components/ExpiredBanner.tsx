import { useTracker } from '../hooks/useTracker';
import { EXPIRED_MESSAGE } from '../../lib/tracker/index';

/** Shown once a countdown reaches zero. */
export default function ExpiredBanner() {
  const { snapshot } = useTracker();
  if (!snapshot.expired) return null;

  return (
    <p role="status" className="rounded bg-red-50 px-3 py-2 text-center text-sm font-semibold text-red-700">
      {EXPIRED_MESSAGE}
    </p>
  );
}
