import { describe, it, expect } from 'vitest';
import { toCents, fromCents, addMoney, subtractMoney, parseMoney, toMoneyString } from '../utils/money';

describe('money utilities', () => {
  it('converts between amounts and cents', () => {
    expect(toCents(12.5)).toBe(1250);
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(fromCents(9999)).toBe(99.99);
  });

  it('adds without floating point drift', () => {
    expect(addMoney(0.1, 0.2)).toBe(0.3);
    expect(addMoney(10.1, 20.2, 5)).toBe(35.3);
    expect(addMoney()).toBe(0);
  });

  it('subtracts', () => {
    expect(subtractMoney(1000, 250.75)).toBe(749.25);
    expect(subtractMoney(0.3, 0.1)).toBe(0.2);
  });

  describe('parseMoney', () => {
    it('parses numeric strings from the driver', () => {
      expect(parseMoney('1500.50')).toBe(1500.5);
    });

    it('treats null, undefined and empty as zero', () => {
      expect(parseMoney(null)).toBe(0);
      expect(parseMoney(undefined)).toBe(0);
      expect(parseMoney('')).toBe(0);
    });

    it('treats garbage as zero', () => {
      expect(parseMoney('abc')).toBe(0);
    });

    it('passes numbers through rounded to cents', () => {
      expect(parseMoney(19.999)).toBe(20);
    });
  });

  it('formats numeric column values', () => {
    expect(toMoneyString(12)).toBe('12.00');
    expect(toMoneyString(0.1 + 0.2)).toBe('0.30');
  });
});
