import { describe, it, expect } from 'vitest';
import { formatClock, formatHours, formatHoursMinutes } from '../format';

describe('formatClock', () => {
  it('formats zero', () => {
    expect(formatClock(0)).toBe('00:00:00');
  });

  it('pads hours, minutes and seconds', () => {
    expect(formatClock(3723)).toBe('01:02:03');
  });

  it('floors fractional seconds', () => {
    expect(formatClock(59.9)).toBe('00:00:59');
  });

  it('lets hours grow past two digits', () => {
    expect(formatClock(100 * 3600 + 5)).toBe('100:00:05');
  });

  it('renders negative and non-finite input as zero', () => {
    expect(formatClock(-10)).toBe('00:00:00');
    expect(formatClock(Number.NaN)).toBe('00:00:00');
  });
});

describe('formatHoursMinutes', () => {
  it('formats as H:MM', () => {
    expect(formatHoursMinutes(3900)).toBe('1:05');
  });

  it('drops seconds', () => {
    expect(formatHoursMinutes(59)).toBe('0:00');
  });
});

describe('formatHours', () => {
  it('rounds to one decimal place', () => {
    expect(formatHours(5400)).toBe('1.5');
    expect(formatHours(3600 + 200)).toBe('1.1');
  });

  it('always shows one decimal', () => {
    expect(formatHours(7200)).toBe('2.0');
    expect(formatHours(0)).toBe('0.0');
  });
});
