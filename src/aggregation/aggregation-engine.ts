/**
 * Aggregation Engine
 *
 * Groups incident records by a key and counts them. (year, region) groupings
 * also carry the group's population and a per-million rate; every other
 * grouping reports `rate: null`.
 *
 * Output order depends only on the keys, never on input order.
 *
 * @module aggregation/aggregation-engine
 */

import { AggregationInconsistencyError, ConfigurationError, type PopulationConflict } from '../core/errors.js';
import {
  REGION_IDS,
  type AggregateBucket,
  type DemographicField,
  type EnrichedIncidentRecord,
  type IncidentRecord,
  type RegionId,
  type YearRegionBucket,
} from '../core/types.js';

export const PER_CAPITA_SCALE = 1_000_000;

export type GroupKey = string | number | null;

export type KeyComparator<K> = (a: K, b: K) => number;

/**
 * Numbers ascending, strings lexicographically, null last
 */
export function compareKeys(a: GroupKey, b: GroupKey): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

/**
 * Count records per distinct key
 */
export function aggregate<T, K extends GroupKey>(
  records: readonly T[],
  keyFn: (record: T) => K,
  compare: KeyComparator<K> = compareKeys
): AggregateBucket<K>[] {
  const counts = new Map<K, number>();
  for (const record of records) {
    const key = keyFn(record);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => compare(a, b))
    .map(([key, count]) => ({ key, count, rate: null }));
}

// ============================================================================
// Per-capita grouping
// ============================================================================

/**
 * Count per (year, region) with rate = count * 1,000,000 / population.
 *
 * @throws AggregationInconsistencyError when records sharing a key carry
 * different populations
 * @throws ConfigurationError when a group's population is not positive
 */
export function aggregateByYearRegion(
  records: readonly EnrichedIncidentRecord[]
): YearRegionBucket[] {
  const groups = new Map<
    string,
    { year: number; region: RegionId; count: number; populations: Set<number> }
  >();

  for (const record of records) {
    const id = `${record.year}|${record.region}`;
    const group = groups.get(id);
    if (group) {
      group.count++;
      group.populations.add(record.population);
    } else {
      groups.set(id, {
        year: record.year,
        region: record.region,
        count: 1,
        populations: new Set([record.population]),
      });
    }
  }

  const conflicts: PopulationConflict[] = [];
  for (const group of groups.values()) {
    if (group.populations.size > 1) {
      conflicts.push({
        year: group.year,
        region: group.region,
        populations: [...group.populations].sort((a, b) => a - b),
      });
    }
  }
  if (conflicts.length > 0) {
    throw new AggregationInconsistencyError(
      `Conflicting populations for ${conflicts.length} (year, region) groups: ` +
        conflicts.map((c) => `${c.year}/${c.region} [${c.populations.join(', ')}]`).join('; '),
      conflicts
    );
  }

  const buckets: YearRegionBucket[] = [];
  for (const group of groups.values()) {
    const [population] = group.populations;
    if (population === undefined || population <= 0) {
      throw new ConfigurationError(
        `Population for ${group.year}/${group.region} must be positive to compute a rate: ${population}`,
        { year: group.year, region: group.region, population }
      );
    }
    buckets.push({
      key: { year: group.year, region: group.region },
      count: group.count,
      population,
      rate: (group.count * PER_CAPITA_SCALE) / population,
    });
  }

  return buckets.sort(
    (a, b) =>
      a.key.year - b.key.year || REGION_IDS.indexOf(a.key.region) - REGION_IDS.indexOf(b.key.region)
  );
}

// ============================================================================
// Convenience groupings
// ============================================================================

export function aggregateByHour(records: readonly IncidentRecord[]): AggregateBucket<number>[] {
  return aggregate(records, (r) => r.hour);
}

export function aggregateByWeekday(records: readonly IncidentRecord[]): AggregateBucket<number>[] {
  return aggregate(records, (r) => r.weekday);
}

export function aggregateByMonth(records: readonly IncidentRecord[]): AggregateBucket<number>[] {
  return aggregate(records, (r) => r.month);
}

export function aggregateByYear(records: readonly IncidentRecord[]): AggregateBucket<number>[] {
  return aggregate(records, (r) => r.year);
}

export function aggregateByPrecinct(records: readonly IncidentRecord[]): AggregateBucket<number>[] {
  return aggregate(records, (r) => r.precinct);
}

export function aggregateByRegion(records: readonly IncidentRecord[]): AggregateBucket<RegionId>[] {
  return aggregate(records, (r) => r.region, (a, b) => REGION_IDS.indexOf(a) - REGION_IDS.indexOf(b));
}

function demographicValue(record: IncidentRecord, field: DemographicField): string | null {
  switch (field) {
    case 'perp_age_group':
      return record.perpetrator.ageGroup;
    case 'perp_sex':
      return record.perpetrator.sex;
    case 'perp_race':
      return record.perpetrator.race;
    case 'vic_age_group':
      return record.victim.ageGroup;
    case 'vic_sex':
      return record.victim.sex;
    case 'vic_race':
      return record.victim.race;
  }
}

/**
 * Count per demographic value; unrecorded values group under null
 */
export function aggregateByDemographic(
  records: readonly IncidentRecord[],
  field: DemographicField
): AggregateBucket<string | null>[] {
  return aggregate(records, (r) => demographicValue(r, field));
}

// ============================================================================
// Ranking
// ============================================================================

function assertPositiveInt(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`N must be a positive integer, got ${n}`);
  }
}

/**
 * Highest counts first; ties broken by ascending key
 */
export function topN<K extends GroupKey>(
  buckets: readonly AggregateBucket<K>[],
  n: number,
  compare: KeyComparator<K> = compareKeys
): AggregateBucket<K>[] {
  assertPositiveInt(n);
  return [...buckets].sort((a, b) => b.count - a.count || compare(a.key, b.key)).slice(0, n);
}

/**
 * Lowest counts first; ties broken by ascending key
 */
export function bottomN<K extends GroupKey>(
  buckets: readonly AggregateBucket<K>[],
  n: number,
  compare: KeyComparator<K> = compareKeys
): AggregateBucket<K>[] {
  assertPositiveInt(n);
  return [...buckets].sort((a, b) => a.count - b.count || compare(a.key, b.key)).slice(0, n);
}
