/**
 * Incident Atlas Core Types
 *
 * Shared data model for the population interpolation and incident enrichment
 * pipeline. Everything here is immutable once constructed.
 *
 * @module core/types
 */

// ============================================================================
// Regions
// ============================================================================

/**
 * Administrative subdivisions covered by the incident dataset
 */
export const REGION_IDS = [
  'BRONX',
  'BROOKLYN',
  'MANHATTAN',
  'QUEENS',
  'STATEN ISLAND',
] as const;

export type RegionId = (typeof REGION_IDS)[number];

/**
 * Type guard for region identifiers (exact, already normalized)
 */
export function isRegionId(value: string): value is RegionId {
  return (REGION_IDS as readonly string[]).includes(value);
}

/**
 * Normalize a raw region label and match it against the enumeration.
 *
 * "  staten   island " -> "STATEN ISLAND"
 */
export function normalizeRegion(raw: string): RegionId | null {
  const normalized = raw.trim().replace(/\s+/g, ' ').toUpperCase();
  return isRegionId(normalized) ? normalized : null;
}

// ============================================================================
// Population
// ============================================================================

/**
 * One census figure for one region in one anchor year
 */
export interface PopulationSnapshot {
  readonly region: RegionId;
  readonly year: number;
  readonly population: number;
}

/**
 * Single anchor point of a piecewise-linear series
 */
export interface AnchorPoint {
  readonly year: number;
  readonly population: number;
}

/**
 * Exactly three anchors, ordered by year
 */
export type AnchorPoints = readonly [AnchorPoint, AnchorPoint, AnchorPoint];

/**
 * Dense per-year population series for one region.
 * Defined for every integer year in [startYear, endYear].
 */
export interface PopulationSeries {
  readonly region: RegionId;
  readonly startYear: number;
  readonly endYear: number;
  readonly points: ReadonlyMap<number, number>;
}

/**
 * Row of the long-form population table
 */
export interface PopulationEntry {
  readonly year: number;
  readonly region: RegionId;
  readonly population: number;
}

// ============================================================================
// Incidents
// ============================================================================

/**
 * Demographic descriptor (victim or perpetrator). Unknown values are null.
 */
export interface Demographics {
  readonly ageGroup: string | null;
  readonly sex: string | null;
  readonly race: string | null;
}

/**
 * One observed incident with calendar fields derived at ingestion
 */
export interface IncidentRecord {
  readonly incidentKey: string;
  /** Calendar date as YYYY-MM-DD */
  readonly occurredAt: string;
  /** Time of day as HH:MM:SS */
  readonly occurredTime: string;
  readonly region: RegionId;
  readonly precinct: number;
  readonly jurisdictionCode: number | null;
  readonly locationDescription: string | null;
  readonly statisticalMurderFlag: boolean;
  readonly perpetrator: Demographics;
  readonly victim: Demographics;
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
  /** 0 = Sunday ... 6 = Saturday */
  readonly weekday: number;
  /** 0-23 */
  readonly hour: number;
}

/**
 * Incident with the population of its (year, region) attached
 */
export interface EnrichedIncidentRecord extends IncidentRecord {
  readonly population: number;
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Count of records sharing one group key.
 * `rate` is per million population, or null when the grouping has no
 * per-capita meaning.
 */
export interface AggregateBucket<K> {
  readonly key: K;
  readonly count: number;
  readonly rate: number | null;
}

export interface YearRegionKey {
  readonly year: number;
  readonly region: RegionId;
}

export interface YearRegionBucket extends AggregateBucket<YearRegionKey> {
  readonly population: number;
  readonly rate: number;
}

/**
 * Demographic columns available for grouping
 */
export type DemographicField =
  | 'perp_age_group'
  | 'perp_sex'
  | 'perp_race'
  | 'vic_age_group'
  | 'vic_sex'
  | 'vic_race';

export const DEMOGRAPHIC_FIELDS: readonly DemographicField[] = [
  'perp_age_group',
  'perp_sex',
  'perp_race',
  'vic_age_group',
  'vic_sex',
  'vic_race',
];
