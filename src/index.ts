/**
 * Incident Atlas
 *
 * Population interpolation, incident enrichment and per-capita aggregation.
 *
 * @example
 * ```typescript
 * import { loadSnapshots, runEnrichmentPipeline, aggregateByYearRegion } from 'incident-atlas';
 *
 * const snapshots = await loadSnapshots();
 * const { enriched, lookupFailures } = runEnrichmentPipeline({ csv, snapshots, targetMaxYear: 2023 });
 * const rates = aggregateByYearRegion(enriched);
 * ```
 */

export * from './core/types.js';
export * from './core/errors.js';
export { Logger, logger, createLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

export {
  validateAnchors,
  interpolatePopulation,
  buildPopulationSeries,
  populationAt,
} from './population/series-builder.js';
export { RegionPopulationTable } from './population/region-table.js';
export {
  DEFAULT_SNAPSHOTS_PATH,
  PopulationSnapshotSchema,
  CensusSnapshotFileSchema,
  parseSnapshotFile,
  loadSnapshots,
  groupAnchorsByRegion,
  buildRegionPopulationTable,
} from './population/snapshots.js';

export {
  REQUIRED_COLUMNS,
  parseCSVLine,
  splitCsvRecords,
  type CsvRecord,
  parseCalendarDate,
  parseTimeOfDay,
  parseIncidentsCsv,
  type ParseIncidentsResult,
} from './ingestion/incident-parser.js';

export {
  enrichIncident,
  enrichIncidents,
  assertFullyEnriched,
  type EnrichmentResult,
  type EnrichmentReport,
} from './enrichment/incident-enricher.js';

export * from './aggregation/aggregation-engine.js';
export * from './aggregation/trend-model.js';

export {
  runEnrichmentPipeline,
  type UnmatchedPolicy,
  type EnrichmentPipelineOptions,
  type EnrichmentPipelineResult,
} from './pipeline/enrichment-pipeline.js';
