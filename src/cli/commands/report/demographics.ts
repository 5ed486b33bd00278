/**
 * Demographic Breakdown Command
 *
 * Usage:
 *   incident-atlas report demographics [csv] --field vic_race [--format <fmt>]
 */

import type { Command } from 'commander';
import { aggregateByDemographic } from '../../../aggregation/aggregation-engine.js';
import { ConfigurationError } from '../../../core/errors.js';
import {
  DEMOGRAPHIC_FIELDS,
  type DemographicField,
  type EnrichedIncidentRecord,
} from '../../../core/types.js';
import { loadEnrichedIncidents, runCommand, type ContextProvider } from '../../lib/context.js';
import {
  formatOutput,
  formatters,
  parseOutputFormat,
  printOutput,
  type TableColumn,
} from '../../lib/output.js';

interface DemographicsOptions {
  readonly field: string;
  readonly format: string;
}

function isDemographicField(value: string): value is DemographicField {
  return (DEMOGRAPHIC_FIELDS as readonly string[]).includes(value);
}

export function buildDemographicReport(
  records: readonly EnrichedIncidentRecord[],
  field: DemographicField
): { value: string | null; count: number; share: number }[] {
  const total = records.length;
  return aggregateByDemographic(records, field).map((bucket) => ({
    value: bucket.key,
    count: bucket.count,
    share: total > 0 ? bucket.count / total : 0,
  }));
}

export function registerDemographicsCommand(parent: Command, getContext: ContextProvider): void {
  parent
    .command('demographics [csv]')
    .description('Incident counts by a victim or perpetrator field')
    .option('--field <name>', `Field: ${DEMOGRAPHIC_FIELDS.join('|')}`, 'vic_race')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (csv: string | undefined, options: DemographicsOptions) => {
      await runCommand(getContext, 'report demographics', async (ctx) => {
        const field = options.field.toLowerCase();
        if (!isDemographicField(field)) {
          throw new ConfigurationError(
            `Invalid field: ${options.field}. Must be one of: ${DEMOGRAPHIC_FIELDS.join(', ')}`
          );
        }
        const format = parseOutputFormat(options.format);
        const { enriched } = await loadEnrichedIncidents(ctx, csv);
        const columns: TableColumn[] = [
          { key: 'value', header: field, format: formatters.nullable },
          { key: 'count', header: 'Incidents', align: 'right' },
          {
            key: 'share',
            header: 'Share',
            align: 'right',
            format: formatters.share,
          },
        ];
        printOutput(formatOutput(buildDemographicReport(enriched, field), format, columns));
      });
    });
}
