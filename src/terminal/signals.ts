/** The part of `process` used to listen for shutdown signals. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Run `quit` on Ctrl+C outside raw mode or on a termination request.
 * Returns a function that removes the listeners.
 */
export function onShutdownSignals(quit: () => void, source: SignalSource = process): () => void {
  for (const signal of SHUTDOWN_SIGNALS) source.on(signal, quit);
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) source.off(signal, quit);
  };
}
