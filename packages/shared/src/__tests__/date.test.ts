import { describe, it, expect } from 'vitest';
import { todayIso, isIsoDate, isFutureDate, rangesOverlap, daysAgo, toIsoTimestamp } from '../utils/date';

const NOW = new Date('2026-03-15T10:30:00Z');

describe('date utilities', () => {
  it('formats today as an ISO date', () => {
    expect(todayIso(NOW)).toBe('2026-03-15');
  });

  describe('isIsoDate', () => {
    it('accepts real calendar dates', () => {
      expect(isIsoDate('2026-02-28')).toBe(true);
      expect(isIsoDate('2024-02-29')).toBe(true);
    });

    it('rejects impossible or malformed dates', () => {
      expect(isIsoDate('2026-02-30')).toBe(false);
      expect(isIsoDate('2026-2-3')).toBe(false);
      expect(isIsoDate('15/03/2026')).toBe(false);
    });
  });

  describe('isFutureDate', () => {
    it('treats today as not in the future', () => {
      expect(isFutureDate('2026-03-15', NOW)).toBe(false);
    });

    it('flags tomorrow', () => {
      expect(isFutureDate('2026-03-16', NOW)).toBe(true);
    });

    it('compares only the date part of a timestamp', () => {
      expect(isFutureDate('2026-03-15T23:00:00Z', NOW)).toBe(false);
    });
  });

  describe('rangesOverlap', () => {
    it('detects overlapping closed ranges', () => {
      expect(rangesOverlap('2026-01-01', '2026-06-30', '2026-06-30', '2026-12-31')).toBe(true);
    });

    it('allows adjacent ranges', () => {
      expect(rangesOverlap('2026-01-01', '2026-06-29', '2026-06-30', '2026-12-31')).toBe(false);
    });

    it('treats a null end as open-ended', () => {
      expect(rangesOverlap('2025-01-01', null, '2026-01-01', '2026-02-01')).toBe(true);
      expect(rangesOverlap('2026-03-01', null, '2026-01-01', '2026-02-01')).toBe(false);
    });
  });

  it('subtracts whole days', () => {
    expect(daysAgo(365, NOW).toISOString()).toBe('2025-03-15T10:30:00.000Z');
  });

  it('toIsoTimestamp converts driver dates and passes strings through', () => {
    expect(toIsoTimestamp(new Date('2026-01-02T03:04:05Z'))).toBe('2026-01-02T03:04:05.000Z');
    expect(toIsoTimestamp('2026-01-02 03:04:05+00')).toBe('2026-01-02 03:04:05+00');
  });
});
