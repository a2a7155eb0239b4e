import { describe, it, expect } from 'vitest';
import { formatTimestamp, systemClock } from './clock';

describe('formatTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });

  it('should use local time', () => {
    expect(formatTimestamp(new Date(1999, 11, 31, 23, 59, 58))).toBe('1999-12-31 23:59:58');
  });
});

describe('systemClock', () => {
  it('should return the current time', () => {
    const before = Date.now();
    const now = systemClock().getTime();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });
});
