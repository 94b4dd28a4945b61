/**
 * Dimension values
 *
 * Every ingested row carries one value per dimension. A value is either
 * present, missing (the row declares the dimension but logged no value) or
 * not applicable (the row's test does not have this dimension at all).
 * Value-based filters never eliminate the latter two.
 */

export type DimensionScalar = string | number;

export type DimensionValue =
  | { readonly kind: 'present'; readonly value: DimensionScalar }
  | { readonly kind: 'missing' }
  | { readonly kind: 'not-applicable' };

export const MISSING: DimensionValue = { kind: 'missing' };
export const NOT_APPLICABLE: DimensionValue = { kind: 'not-applicable' };

export function present(value: DimensionScalar): DimensionValue {
  return { kind: 'present', value };
}

export function isPresent(
  value: DimensionValue
): value is { readonly kind: 'present'; readonly value: DimensionScalar } {
  return value.kind === 'present';
}

/**
 * Stable key for exact-equality grouping. `1` and `"1"` stay distinct, and
 * neither absence marker can collide with a present value.
 */
export function dimensionValueKey(value: DimensionValue): string {
  switch (value.kind) {
    case 'present':
      return typeof value.value === 'number' ? `n:${value.value}` : `s:${value.value}`;
    case 'missing':
      return '!missing';
    case 'not-applicable':
      return '!n/a';
  }
}

export function formatDimensionValue(value: DimensionValue): string {
  switch (value.kind) {
    case 'present':
      return String(value.value);
    case 'missing':
      return '<missing>';
    case 'not-applicable':
      return '<n/a>';
  }
}

/**
 * Order used whenever candidate values are offered to the analyst:
 * numbers before strings, numbers ascending, strings lexicographic.
 */
export function compareScalars(a: DimensionScalar, b: DimensionScalar): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'number') {
    return -1;
  }
  if (typeof b === 'number') {
    return 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
