/**
 * Tests for grouping, per-capita rates and rankings
 */

import { describe, it, expect } from 'vitest';
import {
  aggregate,
  aggregateByDemographic,
  aggregateByHour,
  aggregateByMonth,
  aggregateByPrecinct,
  aggregateByRegion,
  aggregateByWeekday,
  aggregateByYear,
  aggregateByYearRegion,
  bottomN,
  compareKeys,
  topN,
} from '../../../aggregation/aggregation-engine.js';
import { AggregationInconsistencyError, ConfigurationError } from '../../../core/errors.js';
import type { AggregateBucket } from '../../../core/types.js';
import { makeEnriched, makeIncident } from '../../utils/factories.js';

function precinctBuckets(counts: Record<number, number>): AggregateBucket<number>[] {
  return Object.entries(counts).map(([precinct, count]) => ({
    key: Number(precinct),
    count,
    rate: null,
  }));
}

describe('aggregateByYearRegion', () => {
  it('computes count per million residents', () => {
    const records = Array.from({ length: 10 }, () =>
      makeEnriched(1_000_000, { year: 2010, region: 'BRONX' })
    );
    expect(aggregateByYearRegion(records)).toEqual([
      { key: { year: 2010, region: 'BRONX' }, count: 10, population: 1_000_000, rate: 10 },
    ]);
  });

  it('sorts buckets by year then region', () => {
    const records = [
      makeEnriched(400, { year: 2011, region: 'QUEENS' }),
      makeEnriched(200, { year: 2010, region: 'QUEENS' }),
      makeEnriched(500, { year: 2010, region: 'BRONX' }),
      makeEnriched(200, { year: 2010, region: 'QUEENS' }),
    ];
    expect(aggregateByYearRegion(records).map((b) => [b.key.year, b.key.region, b.count, b.rate])).toEqual([
      [2010, 'BRONX', 1, 2000],
      [2010, 'QUEENS', 2, 10000],
      [2011, 'QUEENS', 1, 2500],
    ]);
  });

  it('is independent of input order', () => {
    const records = [
      makeEnriched(300, { year: 2012, region: 'MANHATTAN' }),
      makeEnriched(700, { year: 2013, region: 'BROOKLYN' }),
      makeEnriched(300, { year: 2012, region: 'MANHATTAN' }),
      makeEnriched(700, { year: 2013, region: 'BROOKLYN' }),
      makeEnriched(900, { year: 2012, region: 'QUEENS' }),
    ];
    const forward = aggregateByYearRegion(records);
    const reversed = aggregateByYearRegion([...records].reverse());
    const rotated = aggregateByYearRegion([...records.slice(2), ...records.slice(0, 2)]);
    expect(reversed).toEqual(forward);
    expect(rotated).toEqual(forward);
  });

  it('flags conflicting populations instead of averaging', () => {
    const records = [
      makeEnriched(100, { year: 2010, region: 'BRONX' }),
      makeEnriched(120, { year: 2010, region: 'BRONX' }),
      makeEnriched(50, { year: 2011, region: 'BRONX' }),
    ];
    expect(() => aggregateByYearRegion(records)).toThrow(AggregationInconsistencyError);

    try {
      aggregateByYearRegion(records);
    } catch (error) {
      if (!(error instanceof AggregationInconsistencyError)) throw error;
      expect(error.conflicts).toEqual([{ year: 2010, region: 'BRONX', populations: [100, 120] }]);
      expect(error.message).toBe(
        'Conflicting populations for 1 (year, region) groups: 2010/BRONX [100, 120]'
      );
    }
  });

  it('refuses to compute a rate against a zero population', () => {
    expect(() => aggregateByYearRegion([makeEnriched(0, { year: 2010, region: 'BRONX' })])).toThrow(
      ConfigurationError
    );
  });

  it('returns nothing for no records', () => {
    expect(aggregateByYearRegion([])).toEqual([]);
  });
});

describe('non per-capita groupings', () => {
  const records = [
    makeIncident({ hour: 23, weekday: 6, month: 12, year: 2012, precinct: 75, region: 'BROOKLYN' }),
    makeIncident({ hour: 2, weekday: 0, month: 1, year: 2011, precinct: 40, region: 'BRONX' }),
    makeIncident({ hour: 23, weekday: 6, month: 7, year: 2012, precinct: 75, region: 'BROOKLYN' }),
    makeIncident({ hour: 10, weekday: 2, month: 7, year: 2010, precinct: 113, region: 'QUEENS' }),
  ];

  it('groups by hour with null rates and numeric key order', () => {
    expect(aggregateByHour(records)).toEqual([
      { key: 2, count: 1, rate: null },
      { key: 10, count: 1, rate: null },
      { key: 23, count: 2, rate: null },
    ]);
  });

  it('groups by weekday, month and year', () => {
    expect(aggregateByWeekday(records).map((b) => [b.key, b.count])).toEqual([[0, 1], [2, 1], [6, 2]]);
    expect(aggregateByMonth(records).map((b) => [b.key, b.count])).toEqual([[1, 1], [7, 2], [12, 1]]);
    expect(aggregateByYear(records).map((b) => [b.key, b.count])).toEqual([[2010, 1], [2011, 1], [2012, 2]]);
  });

  it('groups by precinct and region', () => {
    expect(aggregateByPrecinct(records).map((b) => [b.key, b.count])).toEqual([[40, 1], [75, 2], [113, 1]]);
    expect(aggregateByRegion(records).map((b) => [b.key, b.count])).toEqual([
      ['BRONX', 1],
      ['BROOKLYN', 2],
      ['QUEENS', 1],
    ]);
  });

  it('groups unrecorded demographics under null, sorted last', () => {
    const withPerps = [
      makeIncident({ perpetrator: { ageGroup: '18-24', sex: 'M', race: 'BLACK' } }),
      makeIncident({ perpetrator: { ageGroup: null, sex: null, race: null } }),
      makeIncident({ perpetrator: { ageGroup: '25-44', sex: 'F', race: 'WHITE' } }),
      makeIncident({ perpetrator: { ageGroup: '18-24', sex: 'M', race: 'BLACK' } }),
    ];
    expect(aggregateByDemographic(withPerps, 'perp_age_group').map((b) => [b.key, b.count])).toEqual([
      ['18-24', 2],
      ['25-44', 1],
      [null, 1],
    ]);
    expect(aggregateByDemographic(withPerps, 'vic_sex').map((b) => [b.key, b.count])).toEqual([['M', 4]]);
  });

  it('supports custom key functions', () => {
    const byMurderFlag = aggregate(records, (r) => (r.statisticalMurderFlag ? 'murder' : 'non-fatal'));
    expect(byMurderFlag).toEqual([{ key: 'non-fatal', count: 4, rate: null }]);
  });
});

describe('compareKeys', () => {
  it('orders numbers numerically, strings lexically and null last', () => {
    expect([10, 2, 111].sort(compareKeys)).toEqual([2, 10, 111]);
    expect(['b', null, 'a'].sort(compareKeys)).toEqual(['a', 'b', null]);
  });
});

describe('topN / bottomN', () => {
  const buckets = precinctBuckets({
    79: 500,
    44: 480,
    67: 460,
    73: 450,
    75: 440,
    17: 10,
    19: 12,
    22: 15,
    111: 18,
    112: 20,
  });

  it('selects the five busiest precincts in descending order', () => {
    expect(topN(buckets, 5).map((b) => b.key)).toEqual([79, 44, 67, 73, 75]);
  });

  it('selects the five quietest precincts in ascending order', () => {
    expect(bottomN(buckets, 5).map((b) => b.key)).toEqual([17, 19, 22, 111, 112]);
  });

  it('breaks ties by ascending key', () => {
    const tied = precinctBuckets({ 120: 7, 5: 7, 60: 7, 1: 3 });
    expect(topN(tied, 3).map((b) => b.key)).toEqual([5, 60, 120]);
    expect(bottomN(tied, 2).map((b) => b.key)).toEqual([1, 5]);
  });

  it('ranks tied precincts the same whatever order the incidents arrive in', () => {
    const records = [40, 40, 14, 14, 75, 113, 9].map((precinct) => makeIncident({ precinct }));
    const orders = [
      records,
      [...records].reverse(),
      ...[1, 2, 3, 4, 5, 6].map((k) => [...records.slice(k), ...records.slice(0, k)]),
      [records[4], records[0], records[6], records[2], records[5], records[1], records[3]].flatMap(
        (record) => (record === undefined ? [] : [record])
      ),
    ];

    for (const order of orders) {
      const buckets = aggregateByPrecinct(order);
      expect(topN(buckets, 2).map((b) => [b.key, b.count])).toEqual([
        [14, 2],
        [40, 2],
      ]);
      expect(bottomN(buckets, 2).map((b) => [b.key, b.count])).toEqual([
        [9, 1],
        [75, 1],
      ]);
      expect(topN(buckets, 3).map((b) => b.key)).toEqual([14, 40, 9]);
    }
  });

  it('returns every bucket when n exceeds the count', () => {
    expect(topN(precinctBuckets({ 1: 1, 2: 2 }), 5).map((b) => b.key)).toEqual([2, 1]);
  });

  it('does not reorder the input', () => {
    const before = buckets.map((b) => b.key);
    topN(buckets, 3);
    bottomN(buckets, 3);
    expect(buckets.map((b) => b.key)).toEqual(before);
  });

  it('rejects a non-positive n', () => {
    expect(() => topN(buckets, 0)).toThrow(RangeError);
    expect(() => bottomN(buckets, 1.5)).toThrow('N must be a positive integer, got 1.5');
  });
});
