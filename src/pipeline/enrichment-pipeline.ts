/**
 * Enrichment Pipeline
 *
 * Runs the batch stages in order: snapshots -> population table -> parse
 * incidents -> join. Each stage consumes the complete output of the previous
 * one. Configuration errors abort before any incident is touched.
 *
 * @module pipeline/enrichment-pipeline
 */

import type { LookupFailure, RowParseFailure } from '../core/errors.js';
import type { EnrichedIncidentRecord, IncidentRecord, PopulationSnapshot } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { assertFullyEnriched, enrichIncidents } from '../enrichment/incident-enricher.js';
import { parseIncidentsCsv } from '../ingestion/incident-parser.js';
import type { RegionPopulationTable } from '../population/region-table.js';
import { buildRegionPopulationTable } from '../population/snapshots.js';

const logger = createLogger({ module: 'pipeline' });

/**
 * What to do with incidents whose (year, region) has no population entry
 */
export type UnmatchedPolicy = 'exclude' | 'abort';

export interface EnrichmentPipelineOptions {
  /** Raw incident CSV content */
  readonly csv: string;
  readonly snapshots: readonly PopulationSnapshot[];
  readonly targetMaxYear: number;
  readonly onUnmatched?: UnmatchedPolicy;
}

export interface EnrichmentPipelineResult {
  readonly table: RegionPopulationTable;
  readonly parsed: readonly IncidentRecord[];
  readonly enriched: readonly EnrichedIncidentRecord[];
  readonly parseFailures: readonly RowParseFailure[];
  readonly lookupFailures: readonly LookupFailure[];
}

/**
 * @throws ConfigurationError for malformed snapshots
 * @throws IncidentParseError when the CSV header is unusable
 * @throws LookupError when onUnmatched is 'abort' and a lookup fails
 */
export function runEnrichmentPipeline(options: EnrichmentPipelineOptions): EnrichmentPipelineResult {
  const onUnmatched = options.onUnmatched ?? 'exclude';

  const table = buildRegionPopulationTable(options.snapshots, options.targetMaxYear);

  const { records, failures: parseFailures, totalRows } = parseIncidentsCsv(options.csv);
  logger.info('Parsed incidents', {
    rows: totalRows,
    parsed: records.length,
    failed: parseFailures.length,
  });
  if (parseFailures.length > 0) {
    logger.warn('Skipped unparseable rows', {
      count: parseFailures.length,
      firstLine: parseFailures[0]?.line,
      firstReason: parseFailures[0]?.reason,
    });
  }

  const report = enrichIncidents(records, table);
  if (report.failures.length > 0) {
    logger.warn('Incidents without a population entry', {
      count: report.failures.length,
      policy: onUnmatched,
    });
  }

  const enriched = onUnmatched === 'abort' ? assertFullyEnriched(report) : report.enriched;
  logger.info('Enriched incidents', { enriched: enriched.length, unmatched: report.failures.length });

  return {
    table,
    parsed: records,
    enriched,
    parseFailures,
    lookupFailures: report.failures,
  };
}
