import { useTracker } from '../hooks/useTracker';

export default function WarningBanner() {
  const { snapshot } = useTracker();
  if (snapshot.warning === null) return null;

  return (
    <p role="alert" className="rounded bg-amber-50 px-3 py-2 text-xs text-amber-800">
      {snapshot.warning}
    </p>
  );
}
