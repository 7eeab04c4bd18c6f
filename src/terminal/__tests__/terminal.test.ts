import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { join } from 'node:path';
import { intentForKey } from '../keys';
import { BELL, createExpiryAlert, renderStatusLine } from '../status-line';
import { resolveDataFile } from '../paths';
import { onShutdownSignals } from '../signals';
import type { TrackerSnapshot } from '../../lib/tracker/types';

function snapshot(overrides: Partial<TrackerSnapshot> = {}): TrackerSnapshot {
  return {
    mode: 'stopwatch',
    project: 'alpha',
    status: 'stopped',
    totalSeconds: 3725,
    sessionSeconds: 0,
    accumulatedSeconds: 3725,
    remainingSeconds: null,
    expired: false,
    warning: null,
    ...overrides,
  };
}

describe('renderStatusLine', () => {
  it('shows status, project, clock and decimal hours', () => {
    expect(renderStatusLine(snapshot())).toBe('[stopped] alpha  01:02:05  (1.0h)');
  });

  it('marks a running timer and shows its session as H:MM', () => {
    expect(renderStatusLine(snapshot({ status: 'running', totalSeconds: 5400, sessionSeconds: 3900 }))).toBe(
      '[running] alpha  01:30:00  (1.5h)  session 1:05',
    );
  });

  it('renders a missing project', () => {
    expect(renderStatusLine(snapshot({ project: null, totalSeconds: 0 }))).toBe(
      '[stopped] (no project)  00:00:00  (0.0h)',
    );
  });

  it('appends the warning', () => {
    expect(renderStatusLine(snapshot({ warning: 'Could not save "alpha": disk full' }))).toBe(
      '[stopped] alpha  01:02:05  (1.0h)  ! Could not save "alpha": disk full',
    );
  });
});

describe('renderStatusLine in countdown mode', () => {
  const countdown = (overrides: Partial<TrackerSnapshot> = {}) =>
    snapshot({ mode: 'countdown', project: null, totalSeconds: 90, remainingSeconds: 3510, ...overrides });

  it('shows the time left', () => {
    expect(renderStatusLine(countdown({ status: 'running' }))).toBe('[running] countdown  00:58:30 left');
  });

  it("flags an expired countdown", () => {
    expect(renderStatusLine(countdown({ remainingSeconds: 0, expired: true }))).toBe(
      "[stopped] countdown  00:00:00 left  ! Time's up!",
    );
  });
});

describe('createExpiryAlert', () => {
  it('rings once when the countdown reaches zero', () => {
    const alert = createExpiryAlert();
    expect(alert(snapshot({ remainingSeconds: 1 }))).toBe('');
    expect(alert(snapshot({ remainingSeconds: 0, expired: true }))).toBe(BELL);
    expect(alert(snapshot({ remainingSeconds: 0, expired: true }))).toBe('');
    expect(alert(snapshot({ remainingSeconds: 60 }))).toBe('');
    expect(alert(snapshot({ remainingSeconds: 0, expired: true }))).toBe(BELL);
  });
});

describe('intentForKey', () => {
  it('maps named keys', () => {
    expect(intentForKey(' ', { name: 'space' })).toBe('toggle');
    expect(intentForKey('\r', { name: 'return' })).toBe('toggle');
    expect(intentForKey('r', { name: 'r' })).toBe('reset');
    expect(intentForKey('p', { name: 'p' })).toBe('switch');
    expect(intentForKey('c', { name: 'c' })).toBe('countdown');
    expect(intentForKey('q', { name: 'q' })).toBe('quit');
  });

  it('treats Ctrl+C as quit', () => {
    expect(intentForKey('\u0003', { name: 'c', ctrl: true })).toBe('quit');
  });

  it('maps plus and minus, which have no key name', () => {
    expect(intentForKey('+', {})).toBe('add');
    expect(intentForKey('=', { name: undefined })).toBe('add');
    expect(intentForKey('-', undefined)).toBe('remove');
  });

  it('ignores everything else', () => {
    expect(intentForKey('x', { name: 'x' })).toBeNull();
    expect(intentForKey(undefined, undefined)).toBeNull();
  });
});

describe('resolveDataFile', () => {
  it('places the data file beside the program', () => {
    const program = join('opt', 'project-timer', 'dist', 'main.js');
    expect(resolveDataFile(program)).toBe(join('opt', 'project-timer', 'dist', 'projects_data.json'));
  });
});

describe('onShutdownSignals', () => {
  it('quits on SIGINT and SIGTERM until removed', () => {
    const source = new EventEmitter();
    const quit = vi.fn();
    const remove = onShutdownSignals(quit, source);

    source.emit('SIGINT');
    source.emit('SIGTERM');
    expect(quit).toHaveBeenCalledTimes(2);

    remove();
    source.emit('SIGINT');
    expect(quit).toHaveBeenCalledTimes(2);
    expect(source.listenerCount('SIGINT')).toBe(0);
  });
});
