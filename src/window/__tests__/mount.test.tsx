// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { act } from '@testing-library/react';
import { mountWindow } from '../mount';
import { createTracker } from '../../lib/tracker/index';
import { createMemoryStore } from '../../lib/tracker/__tests__/memory-store';

/** Create a Date from a simple offset in seconds from a fixed epoch. */
function t(seconds: number): Date {
  return new Date(Date.UTC(2026, 0, 1, 0, 0, seconds));
}

let container: HTMLDivElement;

beforeEach(() => {
  container = document.createElement('div');
  document.body.appendChild(container);
  vi.spyOn(console, 'info').mockImplementation(() => {});
});

afterEach(() => {
  container.remove();
  vi.restoreAllMocks();
});

describe('mountWindow', () => {
  it('renders the window and saves the running session on close', () => {
    let nowSeconds = 0;
    const store = createMemoryStore({ alpha: { seconds: 60, updatedAt: null } });
    const tracker = createTracker({ store, clock: () => t(nowSeconds) });

    let close: () => void = () => {};
    act(() => {
      close = mountWindow(container, tracker);
    });
    expect(container.querySelector('[data-testid="total-clock"]')?.textContent).toBe('00:01:00');

    act(() => {
      tracker.start();
    });
    nowSeconds = 30;
    act(() => {
      close();
    });

    expect(container.innerHTML).toBe('');
    expect(store.saves).toEqual([['alpha', 90]]);
  });
});
