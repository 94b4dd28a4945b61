/**
 * Display formatting for measurements, fractions and p-values.
 */

/**
 * Unit families, smallest unit first, with the size of each in the
 * family's base unit. Names follow CloudWatch metric units.
 */
const UNIT_FAMILIES: ReadonlyArray<ReadonlyArray<readonly [string, number]>> = [
  [
    ['Microseconds', 1e-6],
    ['Milliseconds', 1e-3],
    ['Seconds', 1],
  ],
  [
    ['Bytes', 1],
    ['Kilobytes', 1024],
    ['Megabytes', 1024 ** 2],
    ['Gigabytes', 1024 ** 3],
    ['Terabytes', 1024 ** 4],
  ],
  [
    ['Bytes/Second', 1],
    ['Kilobytes/Second', 1024],
    ['Megabytes/Second', 1024 ** 2],
    ['Gigabytes/Second', 1024 ** 3],
    ['Terabytes/Second', 1024 ** 4],
  ],
  [
    ['Bits', 1],
    ['Kilobits', 1000],
    ['Megabits', 1000 ** 2],
    ['Gigabits', 1000 ** 3],
    ['Terabits', 1000 ** 4],
  ],
];

/**
 * Rescale a value to the largest unit of its family in which its magnitude
 * is at least one.
 *
 * @example
 * ```typescript
 * formatWithReducedUnit(1500, 'Milliseconds')   // => '1.50 Seconds'
 * formatWithReducedUnit(0.25, 'Milliseconds')   // => '250.00 Microseconds'
 * formatWithReducedUnit(3, 'Count')             // => '3.00 Count'
 * ```
 */
export function formatWithReducedUnit(value: number, unit: string): string {
  const family = UNIT_FAMILIES.find((units) => units.some(([name]) => name === unit));
  const scale = family?.find(([name]) => name === unit)?.[1];
  if (!family || scale === undefined || value === 0 || !Number.isFinite(value)) {
    return `${value.toFixed(2)} ${unit}`;
  }

  const base = value * scale;
  let [reducedUnit, reducedScale] = family[0];
  for (const [name, size] of family) {
    if (Math.abs(base) / size >= 1) {
      reducedUnit = name;
      reducedScale = size;
    }
  }

  return `${(base / reducedScale).toFixed(2)} ${reducedUnit}`;
}

/**
 * @example formatPercent(-0.0375) // => '-3.75%'
 */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}
