/**
 * Population Series Command
 *
 * Prints the dense (year, region, population) table built from the census
 * snapshots.
 *
 * Usage:
 *   incident-atlas population series [--region <name>] [--format <fmt>]
 */

import type { Command } from 'commander';
import { ConfigurationError } from '../../../core/errors.js';
import { normalizeRegion, type PopulationEntry } from '../../../core/types.js';
import type { RegionPopulationTable } from '../../../population/region-table.js';
import { buildRegionPopulationTable, loadSnapshots } from '../../../population/snapshots.js';
import { runCommand, type ContextProvider } from '../../lib/context.js';
import {
  formatOutput,
  formatters,
  parseOutputFormat,
  printOutput,
  type TableColumn,
} from '../../lib/output.js';

interface SeriesOptions {
  readonly region?: string;
  readonly format: string;
}

export const POPULATION_COLUMNS: readonly TableColumn[] = [
  { key: 'year', header: 'Year' },
  { key: 'region', header: 'Region' },
  { key: 'population', header: 'Population', align: 'right', format: formatters.population },
];

/**
 * Table rows, optionally restricted to one region
 *
 * @throws ConfigurationError for a region label outside the enumeration
 */
export function buildPopulationRows(
  table: RegionPopulationTable,
  regionLabel?: string
): PopulationEntry[] {
  if (regionLabel === undefined) {
    return [...table.entries()];
  }
  const region = normalizeRegion(regionLabel);
  if (region === null) {
    throw new ConfigurationError(`Unknown region: ${regionLabel}`);
  }
  return table.entries().filter((entry) => entry.region === region);
}

export function registerSeriesCommand(parent: Command, getContext: ContextProvider): void {
  parent
    .command('series')
    .description('Print the interpolated population for every (year, region)')
    .option('--region <name>', 'Only this region (e.g. "staten island")')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (options: SeriesOptions) => {
      await runCommand(getContext, 'population series', async (ctx) => {
        const format = parseOutputFormat(options.format);
        const snapshots = await loadSnapshots(ctx.config.paths.snapshots);
        const table = buildRegionPopulationTable(snapshots, ctx.config.population.targetMaxYear);
        const rows = buildPopulationRows(table, options.region);
        const data = rows.map((row) => ({
          year: row.year,
          region: row.region,
          population: row.population,
        }));
        printOutput(formatOutput(data, format, POPULATION_COLUMNS));
      });
    });
}
