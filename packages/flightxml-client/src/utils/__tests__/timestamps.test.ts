import { describe, it, expect } from 'vitest';
import { fromWireTimestamp, toWireTimestamp } from '../timestamps';
import { ValidationError } from '../../types/client';

describe('toWireTimestamp', () => {
  it('returns undefined for absent values', () => {
    expect(toWireTimestamp(undefined)).toBeUndefined();
    expect(toWireTimestamp(null)).toBeUndefined();
  });

  it('converts a Date to whole epoch seconds', () => {
    const date = new Date(Date.UTC(2024, 0, 1, 8, 30, 0));
    expect(toWireTimestamp(date)).toBe(1704097800);
  });

  it('truncates fractional seconds toward zero', () => {
    expect(toWireTimestamp(new Date(1999))).toBe(1);
    expect(toWireTimestamp(new Date(-1500))).toBe(-1);
  });

  it('rejects raw epoch numbers', () => {
    expect(() => toWireTimestamp(1704067200)).toThrow(ValidationError);
  });

  it('rejects date strings', () => {
    expect(() => toWireTimestamp('2024-01-01')).toThrow(ValidationError);
  });

  it('rejects invalid dates and plain objects', () => {
    expect(() => toWireTimestamp(new Date('not a date'))).toThrow(ValidationError);
    expect(() => toWireTimestamp({ year: 2024 })).toThrow(ValidationError);
  });

  it('names the expected type in the error', () => {
    expect(() => toWireTimestamp(42)).toThrow('timestamp must be a Date');
  });
});

describe('fromWireTimestamp', () => {
  it('converts epoch seconds to the same instant', () => {
    expect(fromWireTimestamp(0).getTime()).toBe(0);
    expect(fromWireTimestamp(3600).toISOString()).toBe('1970-01-01T01:00:00.000Z');
  });

  it('round-trips whole-second dates', () => {
    const dates = [
      new Date(Date.UTC(1999, 11, 31, 23, 59, 59)),
      new Date(Date.UTC(2024, 1, 29, 12, 0, 0)),
      new Date(0),
    ];

    for (const date of dates) {
      const wire = toWireTimestamp(date);
      expect(wire).toBeDefined();
      expect(fromWireTimestamp(wire ?? Number.NaN)).toEqual(date);
    }
  });
});
