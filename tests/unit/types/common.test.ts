import { describe, it, expect } from 'vitest';
import { addDays, fail, slugify, toIsoDate, validateDateRange } from '@/types/common';

describe('slugify', () => {
  it('produces lowercase kebab slugs', () => {
    expect(slugify('Ocean View #2')).toBe('ocean-view-2');
    expect(slugify('  Late   Check-out ')).toBe('late-check-out');
  });

  it('strips accents', () => {
    expect(slugify('Café Déjà Vu')).toBe('cafe-deja-vu');
  });

  it('returns an empty string when nothing usable is left', () => {
    expect(slugify('!!!')).toBe('');
  });
});

describe('dates', () => {
  it('shifts ISO dates across month boundaries', () => {
    expect(addDays('2026-02-27', 2)).toBe('2026-03-01');
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('formats the UTC calendar date', () => {
    expect(toIsoDate(new Date('2026-07-10T23:30:00Z'))).toBe('2026-07-10');
  });
});

describe('validateDateRange', () => {
  const day = 24 * 60 * 60 * 1000;

  it('accepts a forward range', () => {
    const result = validateDateRange(0, 30 * day);
    expect(result).toEqual({ valid: true, from: new Date(0), to: new Date(30 * day) });
  });

  it('rejects reversed and empty ranges', () => {
    expect(validateDateRange(2000, 1000)).toEqual({ valid: false, error: 'from must be before to' });
    expect(validateDateRange(1000, 1000)).toEqual({ valid: false, error: 'from must be before to' });
  });

  it('rejects invalid timestamps', () => {
    expect(validateDateRange(Number.NaN, 1000)).toEqual({
      valid: false,
      error: 'from is not a valid timestamp',
    });
  });

  it('caps the span', () => {
    expect(validateDateRange(0, 400 * day)).toEqual({
      valid: false,
      error: 'Date range exceeds maximum of 366 days (got 400)',
    });
  });
});

describe('fail', () => {
  it('omits the message key when there is none', () => {
    expect(fail('forbidden')).toEqual({ success: false, error: 'forbidden' });
    expect(Object.keys(fail('forbidden'))).toEqual(['success', 'error']);
  });
});
