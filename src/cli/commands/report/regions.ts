/**
 * Region Report Command
 *
 * Incident counts per (year, region) with the interpolated population and
 * the rate per million residents.
 *
 * Usage:
 *   incident-atlas report regions [csv] [--year <y>] [--format <fmt>]
 */

import type { Command } from 'commander';
import { aggregateByYearRegion } from '../../../aggregation/aggregation-engine.js';
import type { EnrichedIncidentRecord, RegionId } from '../../../core/types.js';
import { parseWholeNumber } from '../../lib/config.js';
import { loadEnrichedIncidents, runCommand, type ContextProvider } from '../../lib/context.js';
import {
  formatOutput,
  formatters,
  parseOutputFormat,
  printOutput,
  type TableColumn,
} from '../../lib/output.js';

interface RegionsOptions {
  readonly year?: string;
  readonly format: string;
}

export interface RegionReportRow {
  readonly year: number;
  readonly region: RegionId;
  readonly count: number;
  readonly population: number;
  readonly rate: number;
  readonly [key: string]: unknown;
}

export const REGION_COLUMNS: readonly TableColumn[] = [
  { key: 'year', header: 'Year' },
  { key: 'region', header: 'Region' },
  { key: 'count', header: 'Incidents', align: 'right' },
  { key: 'population', header: 'Population', align: 'right', format: formatters.population },
  { key: 'rate', header: 'Per Million', align: 'right', format: formatters.decimal(2) },
];

export function buildRegionReport(
  records: readonly EnrichedIncidentRecord[],
  year?: number
): RegionReportRow[] {
  return aggregateByYearRegion(records)
    .filter((bucket) => year === undefined || bucket.key.year === year)
    .map((bucket) => ({
      year: bucket.key.year,
      region: bucket.key.region,
      count: bucket.count,
      population: bucket.population,
      rate: bucket.rate,
    }));
}

export function registerRegionsCommand(parent: Command, getContext: ContextProvider): void {
  parent
    .command('regions [csv]')
    .description('Incidents and per-million rates by year and region')
    .option('--year <y>', 'Only this year')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (csv: string | undefined, options: RegionsOptions) => {
      await runCommand(getContext, 'report regions', async (ctx) => {
        const format = parseOutputFormat(options.format);
        const year = options.year === undefined ? undefined : parseWholeNumber(options.year, '--year');
        const { enriched } = await loadEnrichedIncidents(ctx, csv);
        printOutput(formatOutput(buildRegionReport(enriched, year), format, REGION_COLUMNS));
      });
    });
}
