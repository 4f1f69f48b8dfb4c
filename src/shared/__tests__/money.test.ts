import { describe, it, expect } from 'vitest';
import { centsToUnits, formatCents, isValidCents, toCents, unitsToCents } from '../money';

describe('toCents', () => {
  it('parses whole and fractional amounts', () => {
    expect(toCents('100')).toBe(10000);
    expect(toCents('12.5')).toBe(1250);
    expect(toCents('0.07')).toBe(7);
    expect(toCents(' 42.10 ')).toBe(4210);
  });

  it('accepts numbers with at most two decimals', () => {
    expect(toCents(19.99)).toBe(1999);
    expect(toCents(0.1)).toBe(10);
  });

  it('rejects negative, malformed and over-precise amounts', () => {
    expect(() => toCents('-1')).toThrow(RangeError);
    expect(() => toCents('1.234')).toThrow(RangeError);
    expect(() => toCents('abc')).toThrow('Invalid monetary amount: "abc"');
    expect(() => toCents(Number.NaN)).toThrow(RangeError);
  });

  it('sums without floating point drift', () => {
    expect(toCents('0.1') + toCents('0.2')).toBe(toCents('0.3'));
  });
});

describe('formatCents', () => {
  it('always renders two decimals', () => {
    expect(formatCents(0)).toBe('0.00');
    expect(formatCents(5)).toBe('0.05');
    expect(formatCents(10050)).toBe('100.50');
    expect(formatCents(-250)).toBe('-2.50');
  });

  it('round-trips through toCents', () => {
    for (const cents of [0, 1, 99, 100, 123456789]) {
      expect(toCents(formatCents(cents))).toBe(cents);
    }
  });
});

describe('unit conversion', () => {
  it('converts between cents and currency units', () => {
    expect(centsToUnits(10050)).toBe(100.5);
    expect(unitsToCents(100.5)).toBe(10050);
    expect(unitsToCents(0.29)).toBe(29);
  });

  it('validates cents', () => {
    expect(isValidCents(0)).toBe(true);
    expect(isValidCents(-1)).toBe(false);
    expect(isValidCents(1.5)).toBe(false);
    expect(isValidCents(Number.NaN)).toBe(false);
  });
});
