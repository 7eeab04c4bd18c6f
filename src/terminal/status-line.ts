import type { TrackerSnapshot } from '../lib/tracker/types';
import { formatClock, formatHours, formatHoursMinutes } from '../lib/timer/format';
import { EXPIRED_MESSAGE } from '../lib/tracker/index';

export const HELP_LINE = 'space start/stop   +/- adjust   r reset   p project   c countdown   q quit';

/** Terminal bell. */
export const BELL = '\x07';

/** One-line rendering of the tracker for the terminal. */
export function renderStatusLine(snapshot: TrackerSnapshot): string {
  let line: string;
  if (snapshot.remainingSeconds !== null) {
    line = `[${snapshot.status}] countdown  ${formatClock(snapshot.remainingSeconds)} left`;
    if (snapshot.expired) line += `  ! ${EXPIRED_MESSAGE}`;
  } else {
    const project = snapshot.project ?? '(no project)';
    line = `[${snapshot.status}] ${project}  ${formatClock(snapshot.totalSeconds)}  (${formatHours(snapshot.totalSeconds)}h)`;
    if (snapshot.status === 'running') line += `  session ${formatHoursMinutes(snapshot.sessionSeconds)}`;
  }
  return snapshot.warning === null ? line : `${line}  ! ${snapshot.warning}`;
}

/** Returns the bell once each time a countdown reaches zero, else an empty string. */
export function createExpiryAlert(): (snapshot: TrackerSnapshot) => string {
  let expired = false;
  return (snapshot) => {
    const ring = snapshot.expired && !expired;
    expired = snapshot.expired;
    return ring ? BELL : '';
  };
}
