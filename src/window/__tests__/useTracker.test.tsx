// @vitest-environment jsdom
import { describe, it, expect, vi, afterEach } from 'vitest';
import { renderHook, cleanup, act } from '@testing-library/react';
import { useTracker, useTrackerProvider } from '../hooks/useTracker';
import { createTracker } from '../../lib/tracker/index';
import { createMemoryStore } from '../../lib/tracker/__tests__/memory-store';

afterEach(() => {
  cleanup();
  vi.restoreAllMocks();
});

describe('useTracker', () => {
  it('throws outside a provider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useTracker())).toThrow(
      'useTracker must be used within a TrackerContext provider',
    );
  });
});

describe('useTrackerProvider', () => {
  it('exposes the snapshot, project list and step size', () => {
    const store = createMemoryStore({ alpha: { seconds: 12, updatedAt: null } });
    const tracker = createTracker({ store });
    const { result } = renderHook(() =>
      useTrackerProvider(tracker, { tickIntervalMs: 1000, adjustStepSeconds: 300, countdownSeconds: 1800 }),
    );
    expect(result.current.snapshot.project).toBe('alpha');
    expect(result.current.snapshot.totalSeconds).toBe(12);
    expect(result.current.projects.map((p) => p.name)).toEqual(['alpha']);
    expect(result.current.adjustStepSeconds).toBe(300);
  });

  it('refreshes after intents issued elsewhere', () => {
    const store = createMemoryStore({ alpha: { seconds: 12, updatedAt: null } });
    const tracker = createTracker({ store });
    const { result } = renderHook(() => useTrackerProvider(tracker));

    act(() => {
      tracker.switchProject('beta');
    });
    expect(result.current.snapshot.project).toBe('beta');
    expect(result.current.projects.map((p) => p.name).sort()).toEqual(['alpha', 'beta']);
  });

  it('arms a countdown of the configured length', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const store = createMemoryStore({ alpha: { seconds: 12, updatedAt: null } });
    const tracker = createTracker({ store });
    const { result } = renderHook(() =>
      useTrackerProvider(tracker, { tickIntervalMs: 1000, adjustStepSeconds: 60, countdownSeconds: 1800 }),
    );

    act(() => {
      result.current.selectCountdown();
    });
    expect(result.current.snapshot).toMatchObject({
      mode: 'countdown',
      project: null,
      status: 'stopped',
      remainingSeconds: 1800,
    });
  });
});
