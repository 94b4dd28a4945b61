import { describe, it, expect } from 'vitest';
import { formatPercent, formatWithReducedUnit } from '../../../src/reporting/format.js';

describe('formatWithReducedUnit', () => {
  it('moves up to a larger unit of the same family', () => {
    expect(formatWithReducedUnit(1500, 'Milliseconds')).toBe('1.50 Seconds');
    expect(formatWithReducedUnit(2048, 'Bytes')).toBe('2.00 Kilobytes');
    expect(formatWithReducedUnit(1_500_000, 'Bits')).toBe('1.50 Megabits');
    expect(formatWithReducedUnit(3 * 1024, 'Megabytes/Second')).toBe('3.00 Gigabytes/Second');
  });

  it('moves down to a smaller unit for fractional values', () => {
    expect(formatWithReducedUnit(0.25, 'Milliseconds')).toBe('250.00 Microseconds');
  });

  it('keeps the sign', () => {
    expect(formatWithReducedUnit(-1500, 'Milliseconds')).toBe('-1.50 Seconds');
  });

  it('leaves values in units it cannot scale untouched', () => {
    expect(formatWithReducedUnit(3, 'Count')).toBe('3.00 Count');
    expect(formatWithReducedUnit(0, 'Milliseconds')).toBe('0.00 Milliseconds');
    expect(formatWithReducedUnit(12, 'Milliseconds')).toBe('12.00 Milliseconds');
  });
});

describe('formatPercent', () => {
  it('prints fractions as percentages with two decimals', () => {
    expect(formatPercent(0.125)).toBe('12.50%');
    expect(formatPercent(-0.5)).toBe('-50.00%');
  });
});
