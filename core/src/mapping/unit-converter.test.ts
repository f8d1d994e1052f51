import { describe, expect, it } from 'vitest';
import { createUnitConverter } from './unit-converter.js';

const converter = createUnitConverter({
  time: { baseUnit: 'second', conversions: { second: 1, minute: 60, hour: 3600 } },
  length: { baseUnit: 'meter', conversions: { meter: 1, mm: 0.001, ft: 0.3048 } },
});

describe('createUnitConverter', () => {
  it('multiplies by the unit factor', () => {
    expect(converter.toBase(2, 'hour', 'time')).toBe(7200);
    expect(converter.toBase(1500, 'mm', 'length')).toBeCloseTo(1.5);
  });

  it('matches units case-insensitively when the exact spelling is absent', () => {
    expect(converter.toBase(3, 'Minute', 'time')).toBe(180);
  });

  it('returns to the original value through fromBase', () => {
    for (const [value, unit, category] of [
      [12.5, 'minute', 'time'],
      [0.75, 'hour', 'time'],
      [42, 'ft', 'length'],
      [3, 'mm', 'length'],
    ] as const) {
      expect(converter.fromBase(converter.toBase(value, unit, category), unit, category)).toBeCloseTo(value, 9);
    }
  });

  it('treats unresolvable conversions as identity', () => {
    expect(converter.toBase(5, 'second', 'time')).toBe(5);
    expect(converter.toBase(5, 'parsec', 'length')).toBe(5);
    expect(converter.toBase(5, 'kg', 'weight')).toBe(5);
    expect(converter.toBase(5, undefined, 'time')).toBe(5);
  });

  it('explains how a unit resolves', () => {
    expect(converter.inspect('second', 'time')).toEqual({ kind: 'base' });
    expect(converter.inspect('minute', 'time')).toEqual({ kind: 'factor', factor: 60 });
    expect(converter.inspect('parsec', 'length')).toEqual({ kind: 'unknown-unit' });
    expect(converter.inspect('kg', 'weight')).toEqual({ kind: 'unknown-category' });
    expect(converter.inspect(undefined, 'time')).toEqual({ kind: 'missing-unit' });
    expect(converter.baseUnit('length')).toBe('meter');
  });
});
