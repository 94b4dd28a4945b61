import { describe, it, expect } from 'vitest';
import { dimensionEntropy, maximumEntropyDimension, scoreDimensions } from '../../../src/reduction/entropy.js';
import { createSelectionState } from '../../../src/reduction/selection-state.js';
import { makeGroups, makeRow } from '../../helpers/analysis-fixtures.js';

describe('dimensionEntropy', () => {
  it('measures the spread of retained groups over present values', () => {
    const groups = makeGroups(
      [makeRow({ a: 'x', b: 1 }), makeRow({ a: 'x', b: 2 }), makeRow({ a: 'y', b: 3 }), makeRow({ a: 'y', b: 4 })],
      ['a', 'b']
    );

    expect(dimensionEntropy(groups, 'a')).toBeCloseTo(Math.LN2, 12);
    expect(dimensionEntropy(groups, 'b')).toBeCloseTo(Math.log(4), 12);
  });

  it('ignores groups without a value for the dimension', () => {
    const groups = makeGroups([makeRow({ a: 1, b: 1 }), makeRow({ a: null, b: 2 }), makeRow({ b: 3 })], ['a', 'b']);

    expect(dimensionEntropy(groups, 'a')).toBe(0);
  });

  it('has no score for a dimension no group has a value for', () => {
    const groups = makeGroups([makeRow({ a: null, b: 1 }), makeRow({ b: 2 })], ['a', 'b']);

    expect(dimensionEntropy(groups, 'a')).toBeUndefined();
  });
});

describe('maximumEntropyDimension', () => {
  it('picks the dimension whose answer splits the groups most evenly', () => {
    const dimensions = ['a', 'b'];
    const state = createSelectionState(
      makeGroups([makeRow({ a: 1, b: 1 }), makeRow({ a: 1, b: 2 }), makeRow({ a: 2, b: 3 })], dimensions),
      dimensions
    );

    expect(maximumEntropyDimension(state)).toBe('b');
  });

  it('breaks ties by the lexicographically first name', () => {
    const dimensions = ['zone', 'arch'];
    const state = createSelectionState(
      makeGroups([makeRow({ zone: 1, arch: 'x86' }), makeRow({ zone: 2, arch: 'arm' })], dimensions),
      dimensions
    );

    expect(scoreDimensions(state).map((score) => score.dimension)).toEqual(['arch', 'zone']);
    expect(maximumEntropyDimension(state)).toBe('arch');
  });

  it('returns undefined when no free dimension applies', () => {
    const state = createSelectionState(makeGroups([makeRow({ a: null })], ['a']), ['a']);

    expect(maximumEntropyDimension(state)).toBeUndefined();
  });
});
