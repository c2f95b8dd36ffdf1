import { describe, it, expect } from 'vitest';
import { Fraction } from '../src/pipeline/fraction';

describe('Fraction', () => {
  it('normalizes sign and common factors', () => {
    const f = Fraction.of(6, -8);
    expect(f.num).toBe(-3);
    expect(f.den).toBe(4);
    expect(f.toString()).toBe('-3/4');
    expect(Fraction.of(0, 5)).toBe(Fraction.ZERO);
  });

  it('rejects zero denominators and non-integers', () => {
    expect(() => Fraction.of(1, 0)).toThrow(RangeError);
    expect(() => Fraction.of(0.5)).toThrow(RangeError);
  });

  it('adds, subtracts, multiplies and divides exactly', () => {
    const eighth = Fraction.of(1, 8);
    expect(eighth.add(Fraction.of(1, 3)).toString()).toBe('11/24');
    expect(Fraction.of(3).sub(eighth).toString()).toBe('23/8');
    expect(eighth.times(160).toString()).toBe('20');
    expect(Fraction.of(200000, 2000).div(eighth).toString()).toBe('800');
  });

  it('does not drift over many small steps', () => {
    let t = Fraction.ZERO;
    for (let i = 0; i < 80000; i++) t = t.add(Fraction.of(1, 8));
    expect(t.equals(Fraction.of(10000))).toBe(true);
  });

  it('floors a float onto a step grid', () => {
    const eighth = Fraction.of(1, 8);
    expect(Fraction.floorTo(12.3, eighth).toString()).toBe('49/4');
    expect(Fraction.floorTo(12.25, eighth).toString()).toBe('49/4');
    expect(Fraction.floorTo(0.1, eighth)).toBe(Fraction.ZERO);
  });

  it('rounds halves up and ceils onto a grid', () => {
    expect(Fraction.of(3, 2).round()).toBe(2);
    expect(Fraction.of(5, 4).round()).toBe(1);
    expect(Fraction.of(-3, 2).floor()).toBe(-2);
    expect(Fraction.of(1001, 1000).ceilTo(Fraction.of(1, 8)).toString()).toBe('9/8');
    expect(Fraction.of(9, 8).ceilTo(Fraction.of(1, 8)).toString()).toBe('9/8');
  });

  it('compares values', () => {
    expect(Fraction.of(1, 3).compare(Fraction.of(1, 4))).toBe(1);
    expect(Fraction.of(1, 4).compare(Fraction.of(2, 8))).toBe(0);
    expect(Fraction.of(-1, 4).isNegative()).toBe(true);
  });
});
