import { describe, it, expect } from 'vitest';
import { flattenRuns, groupResults, tupleKey } from '../../../src/grouping/result-grouper.js';
import { MISSING, NOT_APPLICABLE, present } from '../../../src/types/dimensions.js';
import { dimensionMap, makePair, makeRow } from '../../helpers/analysis-fixtures.js';

describe('groupResults', () => {
  it('partitions rows by their full dimension tuple', () => {
    const first = makePair({ buildNumber: 1 });
    const second = makePair({ buildNumber: 2 });
    const third = makePair({ buildNumber: 3 });
    const rows = [
      makeRow({ instance: 'm5d', test: 'boot' }, first),
      makeRow({ instance: 'm6i', test: 'boot' }, second),
      makeRow({ instance: 'm5d', test: 'boot' }, third),
    ];

    const groups = [...groupResults(rows, ['instance', 'test']).values()];

    expect(groups).toHaveLength(2);
    expect(groups[0].runs).toEqual([first, third]);
    expect(groups[1].runs).toEqual([second]);
    expect(groups[0].values.get('instance')).toEqual(present('m5d'));
    expect(flattenRuns(groups)).toEqual([first, third, second]);
  });

  it('keeps missing and not-applicable values apart from each other and from present ones', () => {
    const rows = [
      makeRow({ vcpus: 2 }),
      makeRow({ vcpus: null }),
      makeRow({ vcpus: undefined }),
      makeRow({}),
      makeRow({ vcpus: '2' }),
    ];

    const groups = [...groupResults(rows, ['vcpus']).values()];

    expect(groups.map((group) => group.values.get('vcpus'))).toEqual([
      present(2),
      MISSING,
      NOT_APPLICABLE,
      present('2'),
    ]);
    // A row without the key at all is not applicable
    expect(groups[2].runs).toHaveLength(2);
  });

  it('gives every group exactly one value per dimension', () => {
    const groups = [...groupResults([makeRow({ a: 1, extra: 'x' })], ['a', 'b']).values()];

    expect([...groups[0].values.keys()]).toEqual(['a', 'b']);
    expect(groups[0].values.get('b')).toEqual(NOT_APPLICABLE);
  });

  it('returns no groups for no rows', () => {
    expect(groupResults([], ['a']).size).toBe(0);
  });
});

describe('tupleKey', () => {
  it('encodes value kinds distinctly', () => {
    expect(tupleKey(dimensionMap({ a: 1, b: 's', c: null }), ['a', 'b', 'c', 'd'])).toBe(
      '["n:1","s:s","!missing","!n/a"]'
    );
  });
});
