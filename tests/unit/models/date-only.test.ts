import { describe, it, expect } from 'vitest';
import { formatNavDate, parseNavDate } from '../../../src/models/date-only.js';

describe('formatNavDate', () => {
  it('writes the UTC calendar day', () => {
    expect(formatNavDate(new Date(Date.UTC(2024, 1, 29, 23, 59)))).toBe('2024-02-29');
  });

  it('pads years below 1000', () => {
    const blank = new Date(0);
    blank.setUTCFullYear(1, 0, 1);

    expect(formatNavDate(blank)).toBe('0001-01-01');
  });
});

describe('parseNavDate', () => {
  it('reads a date at UTC midnight', () => {
    expect(parseNavDate('2024-03-15')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
  });

  it('ignores a trailing time part', () => {
    expect(parseNavDate('2024-03-15T10:30:00Z')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
  });

  it('keeps the NAV blank date in year 1', () => {
    expect(parseNavDate('0001-01-01')?.getUTCFullYear()).toBe(1);
  });

  it('rejects days that do not exist', () => {
    expect(parseNavDate('2023-02-29')).toBeUndefined();
  });

  it('returns undefined for empty or malformed text', () => {
    expect(parseNavDate('')).toBeUndefined();
    expect(parseNavDate(undefined)).toBeUndefined();
    expect(parseNavDate('15/03/2024')).toBeUndefined();
  });
});
