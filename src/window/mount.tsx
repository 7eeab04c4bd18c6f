import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import type { Tracker } from '../lib/tracker/types';

/**
 * Render the timer window into `container`. The returned function unmounts
 * it and shuts the tracker down, saving the running session.
 */
export function mountWindow(container: Element, tracker: Tracker): () => void {
  const root = createRoot(container);
  root.render(
    <StrictMode>
      <App tracker={tracker} />
    </StrictMode>,
  );
  return () => {
    root.unmount();
    tracker.shutdown();
  };
}
