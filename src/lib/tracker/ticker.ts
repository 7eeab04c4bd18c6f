/**
 * Cooperative redisplay tick. Calls `render(read())` immediately and then
 * every `intervalMs`. `read` must not mutate tracker state.
 * Returns a function that stops the tick.
 */
export function startTicker<T>(
  read: () => T,
  render: (value: T) => void,
  intervalMs: number,
): () => void {
  render(read());
  const id = setInterval(() => render(read()), intervalMs);
  return () => clearInterval(id);
}
