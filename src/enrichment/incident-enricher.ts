/**
 * Incident Enricher
 *
 * Explicit join of incident records onto the region population table by
 * (year, region). Every input produces either a matched enriched record or
 * an unmatched lookup failure; nothing is dropped and no population is ever
 * defaulted.
 *
 * @module enrichment/incident-enricher
 */

import { LookupError, type LookupFailure } from '../core/errors.js';
import type { EnrichedIncidentRecord, IncidentRecord } from '../core/types.js';
import type { RegionPopulationTable } from '../population/region-table.js';

export type EnrichmentResult =
  | { readonly status: 'matched'; readonly record: EnrichedIncidentRecord }
  | { readonly status: 'unmatched'; readonly failure: LookupFailure };

export interface EnrichmentReport {
  /** One result per input record, in input order */
  readonly results: readonly EnrichmentResult[];
  readonly enriched: readonly EnrichedIncidentRecord[];
  readonly failures: readonly LookupFailure[];
}

/**
 * Join a single record onto the table
 */
export function enrichIncident(
  record: IncidentRecord,
  table: RegionPopulationTable
): EnrichmentResult {
  const population = table.lookup(record.year, record.region);
  if (population !== undefined) {
    return {
      status: 'matched',
      record: Object.freeze({ ...record, population }),
    };
  }

  return {
    status: 'unmatched',
    failure: Object.freeze({
      incidentKey: record.incidentKey,
      year: record.year,
      region: record.region,
      reason: table.hasRegion(record.region) ? 'year_out_of_range' : 'unknown_region',
    }),
  };
}

/**
 * Enrich the whole input before returning.
 *
 * @example
 * ```typescript
 * const { enriched, failures } = enrichIncidents(records, table);
 * if (failures.length > 0) logger.warn('Unmatched incidents', { count: failures.length });
 * ```
 */
export function enrichIncidents(
  records: readonly IncidentRecord[],
  table: RegionPopulationTable
): EnrichmentReport {
  const results: EnrichmentResult[] = [];
  const enriched: EnrichedIncidentRecord[] = [];
  const failures: LookupFailure[] = [];

  for (const record of records) {
    const result = enrichIncident(record, table);
    results.push(result);
    if (result.status === 'matched') {
      enriched.push(result.record);
    } else {
      failures.push(result.failure);
    }
  }

  return { results, enriched, failures };
}

/**
 * Return the enriched records, or throw when any lookup failed
 *
 * @throws LookupError carrying every failure
 */
export function assertFullyEnriched(report: EnrichmentReport): readonly EnrichedIncidentRecord[] {
  if (report.failures.length > 0) {
    throw new LookupError(
      `${report.failures.length} of ${report.results.length} incidents have no population entry`,
      report.failures
    );
  }
  return report.enriched;
}
