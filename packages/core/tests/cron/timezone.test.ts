import { describe, it, expect } from 'vitest';
import { fromWallClock, isValidTimezone, offsetAt, toWallClock } from '../../src/cron/timezone.ts';

describe('timezone helpers', () => {
  describe('isValidTimezone', () => {
    it('should accept IANA zones', () => {
      expect(isValidTimezone('UTC')).toBe(true);
      expect(isValidTimezone('Asia/Shanghai')).toBe(true);
    });

    it('should reject unknown or empty zones', () => {
      expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
      expect(isValidTimezone('')).toBe(false);
    });
  });

  it('should read the wall clock in a zone', () => {
    expect(toWallClock(Date.UTC(2026, 0, 1, 12, 30, 15), 'Asia/Shanghai')).toEqual({
      year: 2026,
      month: 1,
      day: 1,
      hour: 20,
      minute: 30,
      second: 15,
    });
  });

  it('should report the offset on both sides of a DST change', () => {
    expect(offsetAt(Date.UTC(2026, 0, 15), 'America/New_York')).toBe(-5 * 3600_000);
    expect(offsetAt(Date.UTC(2026, 6, 15), 'America/New_York')).toBe(-4 * 3600_000);
  });

  describe('fromWallClock', () => {
    it('should convert an ordinary local time', () => {
      const wall = { year: 2026, month: 7, day: 1, hour: 9, minute: 0, second: 0 };
      expect(fromWallClock(wall, 'America/New_York')).toBe(Date.UTC(2026, 6, 1, 13, 0, 0));
    });

    it('should return null inside a spring-forward gap', () => {
      const wall = { year: 2026, month: 3, day: 8, hour: 2, minute: 30, second: 0 };
      expect(fromWallClock(wall, 'America/New_York')).toBeNull();
    });

    it('should pick the first instant of a repeated hour', () => {
      const wall = { year: 2026, month: 11, day: 1, hour: 1, minute: 30, second: 0 };
      expect(fromWallClock(wall, 'America/New_York')).toBe(Date.UTC(2026, 10, 1, 5, 30, 0));
    });
  });
});
