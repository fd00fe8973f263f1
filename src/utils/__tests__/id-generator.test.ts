import { describe, expect, it, vi } from 'vitest';
import { IdGenerator } from '../id-generator';

describe('IdGenerator', () => {
  it('formats prefix, 13-digit timestamp and zero-padded sequence', () => {
    const ids = new IdGenerator({ now: () => 1760000000000, random: () => 42 });

    expect(ids.next('ORD')).toBe('ORD1760000000000000042');
    expect(ids.next('ORD')).toBe('ORD1760000000000000043');
  });

  it('uses the standard prefixes in its helpers', () => {
    const ids = new IdGenerator({ now: () => 1760000000000, random: () => 0 });

    expect(ids.orderNumber()).toBe('ORD1760000000000000000');
    expect(ids.paymentNumber()).toBe('PAY1760000000000000001');
    expect(ids.refundNumber()).toBe('REF1760000000000000002');
    expect(ids.settlementNumber()).toBe('SET1760000000000000003');
  });

  it('issues distinct identifiers under a burst of calls', () => {
    const ids = new IdGenerator();
    const issued = new Set<string>();
    for (let i = 0; i < 20000; i++) {
      issued.add(ids.orderNumber());
    }
    expect(issued.size).toBe(20000);
  });

  it('keeps the timestamp non-decreasing when the clock moves backwards', () => {
    const readings = [1000, 900];
    const ids = new IdGenerator({ now: () => readings.shift() ?? 900, random: () => 5 });

    expect(ids.next('PAY')).toBe('PAY0000000001000000005');
    expect(ids.next('PAY')).toBe('PAY0000000001000000006');
  });

  it('waits for the next millisecond when the sequence wraps to its start', () => {
    let calls = 0;
    const now = () => {
      calls += 1;
      return calls <= 11 ? 1000 : 1001;
    };
    const ids = new IdGenerator({ sequenceDigits: 1, now, random: () => 7 });

    const issued = Array.from({ length: 11 }, () => ids.next('REF'));

    expect(issued.slice(0, 10).map((id) => id.slice(-1))).toEqual(['7', '8', '9', '0', '1', '2', '3', '4', '5', '6']);
    expect(issued.slice(0, 10).every((id) => id.startsWith('REF0000000001000'))).toBe(true);
    expect(issued[10]).toBe('REF00000000010017');
    expect(new Set(issued).size).toBe(11);
  });

  it('moves to the following millisecond without waiting when the clock is behind on wrap', () => {
    const readings = [1000];
    const now = vi.fn(() => readings.shift() ?? 500);
    const ids = new IdGenerator({ sequenceDigits: 1, now, random: () => 0 });

    const issued = Array.from({ length: 12 }, () => ids.next('ORD'));

    expect(issued.slice(0, 10).every((id) => id.startsWith('ORD0000000001000'))).toBe(true);
    expect(issued[10]).toBe('ORD00000000010010');
    expect(issued[11]).toBe('ORD00000000010011');
    expect(new Set(issued).size).toBe(12);
    expect(now).toHaveBeenCalledTimes(13);
  });

  it('rejects malformed prefixes and widths', () => {
    const ids = new IdGenerator();

    expect(() => ids.next('ord')).toThrow(RangeError);
    expect(() => ids.next('')).toThrow(RangeError);
    expect(() => new IdGenerator({ sequenceDigits: 0 })).toThrow(RangeError);
  });
});
