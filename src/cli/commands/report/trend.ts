/**
 * Trend Report Command
 *
 * Least squares line per region over yearly counts or per-million rates.
 *
 * Usage:
 *   incident-atlas report trend [csv] [--metric count|rate] [--region <name>]
 */

import type { Command } from 'commander';
import { predict, yearlyTrends, type TrendMetric } from '../../../aggregation/trend-model.js';
import { ConfigurationError } from '../../../core/errors.js';
import { normalizeRegion, type EnrichedIncidentRecord, type RegionId } from '../../../core/types.js';
import { loadEnrichedIncidents, runCommand, type ContextProvider } from '../../lib/context.js';
import {
  formatOutput,
  formatters,
  parseOutputFormat,
  printOutput,
  type TableColumn,
} from '../../lib/output.js';

interface TrendOptions {
  readonly metric: string;
  readonly region?: string;
  readonly format: string;
}

export interface TrendReportRow {
  readonly region: RegionId;
  readonly metric: TrendMetric;
  readonly years: string;
  readonly slope: number;
  readonly intercept: number;
  readonly rSquared: number;
  /** Fitted value one year past the last observed year */
  readonly nextYear: number;
  readonly projected: number;
  readonly [key: string]: unknown;
}

const TREND_COLUMNS: readonly TableColumn[] = [
  { key: 'region', header: 'Region' },
  { key: 'metric', header: 'Metric' },
  { key: 'years', header: 'Years' },
  { key: 'slope', header: 'Slope/yr', align: 'right', format: formatters.decimal(2) },
  { key: 'rSquared', header: 'R²', align: 'right', format: formatters.decimal(3) },
  { key: 'nextYear', header: 'Next', align: 'right' },
  { key: 'projected', header: 'Projected', align: 'right', format: formatters.decimal(1) },
];

export function buildTrendReport(
  records: readonly EnrichedIncidentRecord[],
  metric: TrendMetric,
  region?: RegionId
): TrendReportRow[] {
  return yearlyTrends(records, metric)
    .filter((t) => region === undefined || t.region === region)
    .map((t) => {
      const years = t.points.map((p) => p.x);
      const first = Math.min(...years);
      const last = Math.max(...years);
      return {
        region: t.region,
        metric: t.metric,
        years: `${first}-${last}`,
        slope: t.trend.slope,
        intercept: t.trend.intercept,
        rSquared: t.trend.rSquared,
        nextYear: last + 1,
        projected: predict(t.trend, last + 1),
      };
    });
}

export function registerTrendCommand(parent: Command, getContext: ContextProvider): void {
  parent
    .command('trend [csv]')
    .description('Linear trend of yearly incidents per region')
    .option('--metric <m>', 'Metric: count|rate', 'count')
    .option('--region <name>', 'Only this region')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (csv: string | undefined, options: TrendOptions) => {
      await runCommand(getContext, 'report trend', async (ctx) => {
        const metric = options.metric;
        if (metric !== 'count' && metric !== 'rate') {
          throw new ConfigurationError(`Invalid metric: ${metric}. Must be count or rate`);
        }
        const format = parseOutputFormat(options.format);
        let region: RegionId | undefined;
        if (options.region !== undefined) {
          const normalized = normalizeRegion(options.region);
          if (normalized === null) {
            throw new ConfigurationError(`Unknown region: ${options.region}`);
          }
          region = normalized;
        }

        const { enriched } = await loadEnrichedIncidents(ctx, csv);
        const rows = buildTrendReport(enriched, metric, region);
        printOutput(formatOutput(rows, format, TREND_COLUMNS));
      });
    });
}
