/**
 * Test factories for incident records and anchors
 */

import {
  REGION_IDS,
  type AnchorPoint,
  type EnrichedIncidentRecord,
  type IncidentRecord,
  type PopulationSnapshot,
  type RegionId,
} from '../../core/types.js';

let counter = 0;

export function makeIncident(overrides: Partial<IncidentRecord> = {}): IncidentRecord {
  counter++;
  return {
    incidentKey: `TEST-${counter}`,
    occurredAt: '2010-06-15',
    occurredTime: '14:30:00',
    region: 'BRONX',
    precinct: 40,
    jurisdictionCode: 0,
    locationDescription: null,
    statisticalMurderFlag: false,
    perpetrator: { ageGroup: null, sex: null, race: null },
    victim: { ageGroup: '25-44', sex: 'M', race: 'BLACK' },
    year: 2010,
    month: 6,
    day: 15,
    weekday: 2,
    hour: 14,
    ...overrides,
  };
}

export function makeEnriched(
  population: number,
  overrides: Partial<IncidentRecord> = {}
): EnrichedIncidentRecord {
  return { ...makeIncident(overrides), population };
}

export function makeIncidents(count: number, overrides: Partial<IncidentRecord> = {}): IncidentRecord[] {
  return Array.from({ length: count }, () => makeIncident(overrides));
}

/** 2000 -> 100, 2010 -> 200, 2020 -> 400 */
export const DOUBLING_ANCHORS: readonly AnchorPoint[] = [
  { year: 2000, population: 100 },
  { year: 2010, population: 200 },
  { year: 2020, population: 400 },
];

export function snapshotsFor(region: RegionId, anchors: readonly AnchorPoint[]): PopulationSnapshot[] {
  return anchors.map((anchor) => ({ region, ...anchor }));
}

/** The same anchors for every region, so a snapshot set is complete */
export function snapshotsForAllRegions(anchors: readonly AnchorPoint[] = DOUBLING_ANCHORS): PopulationSnapshot[] {
  return REGION_IDS.flatMap((region) => snapshotsFor(region, anchors));
}
