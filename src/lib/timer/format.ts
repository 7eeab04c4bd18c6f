// ---------------------------------------------------------------------------
// Display formatting for second counts
// ---------------------------------------------------------------------------

function wholeSeconds(seconds: number): number {
  return Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

/** `HH:MM:SS`. Hours grow past two digits rather than wrapping. */
export function formatClock(seconds: number): string {
  const total = wholeSeconds(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}

/** `H:MM`, e.g. `1:05`. */
export function formatHoursMinutes(seconds: number): string {
  const total = wholeSeconds(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  return `${h}:${pad(m)}`;
}

/** Decimal hours rounded to one place, e.g. `1.5`. */
export function formatHours(seconds: number): string {
  const hours = Number.isFinite(seconds) && seconds > 0 ? seconds / 3600 : 0;
  return (Math.round(hours * 10) / 10).toFixed(1);
}
