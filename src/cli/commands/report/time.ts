/**
 * Time Distribution Report Command
 *
 * Usage:
 *   incident-atlas report time [csv] --by hour|weekday|month|year [--format <fmt>]
 */

import type { Command } from 'commander';
import {
  aggregateByHour,
  aggregateByMonth,
  aggregateByWeekday,
  aggregateByYear,
} from '../../../aggregation/aggregation-engine.js';
import { ConfigurationError } from '../../../core/errors.js';
import type { AggregateBucket, EnrichedIncidentRecord, IncidentRecord } from '../../../core/types.js';
import { loadEnrichedIncidents, runCommand, type ContextProvider } from '../../lib/context.js';
import {
  formatOutput,
  formatters,
  parseOutputFormat,
  printOutput,
  type TableColumn,
} from '../../lib/output.js';

export type TimeGrouping = 'hour' | 'weekday' | 'month' | 'year';

export const TIME_GROUPINGS: readonly TimeGrouping[] = ['hour', 'weekday', 'month', 'year'];

function isTimeGrouping(value: string): value is TimeGrouping {
  return (TIME_GROUPINGS as readonly string[]).includes(value);
}

interface TimeOptions {
  readonly by: string;
  readonly format: string;
}

const AGGREGATORS: Record<TimeGrouping, (records: readonly IncidentRecord[]) => AggregateBucket<number>[]> = {
  hour: aggregateByHour,
  weekday: aggregateByWeekday,
  month: aggregateByMonth,
  year: aggregateByYear,
};

export function buildTimeReport(
  records: readonly EnrichedIncidentRecord[],
  by: TimeGrouping
): { key: number; count: number }[] {
  return AGGREGATORS[by](records).map((bucket) => ({ key: bucket.key, count: bucket.count }));
}

function columnsFor(by: TimeGrouping): TableColumn[] {
  return [
    {
      key: 'key',
      header: by.charAt(0).toUpperCase() + by.slice(1),
      ...(by === 'weekday' ? { format: formatters.weekday } : {}),
    },
    { key: 'count', header: 'Incidents', align: 'right' },
  ];
}

export function registerTimeCommand(parent: Command, getContext: ContextProvider): void {
  parent
    .command('time [csv]')
    .description('Incident counts by hour of day, weekday, month or year')
    .option('--by <grouping>', 'Grouping: hour|weekday|month|year', 'hour')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (csv: string | undefined, options: TimeOptions) => {
      await runCommand(getContext, 'report time', async (ctx) => {
        const by = options.by;
        if (!isTimeGrouping(by)) {
          throw new ConfigurationError(`Invalid grouping: ${by}. Must be one of: ${TIME_GROUPINGS.join(', ')}`);
        }
        const format = parseOutputFormat(options.format);
        const { enriched } = await loadEnrichedIncidents(ctx, csv);
        printOutput(formatOutput(buildTimeReport(enriched, by), format, columnsFor(by)));
      });
    });
}
