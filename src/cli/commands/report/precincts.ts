/**
 * Precinct Ranking Command
 *
 * Top-N and bottom-N precincts by raw incident count. Ties break on the
 * lower precinct number.
 *
 * Usage:
 *   incident-atlas report precincts [csv] [--top <n>] [--json]
 */

import type { Command } from 'commander';
import { aggregateByPrecinct, bottomN, topN } from '../../../aggregation/aggregation-engine.js';
import { ConfigurationError } from '../../../core/errors.js';
import type { EnrichedIncidentRecord } from '../../../core/types.js';
import { parseWholeNumber } from '../../lib/config.js';
import { loadEnrichedIncidents, runCommand, type ContextProvider } from '../../lib/context.js';
import { formatJson, formatTable, printOutput, type TableColumn } from '../../lib/output.js';

interface PrecinctOptions {
  readonly top?: string;
}

export interface PrecinctRanking {
  readonly top: readonly { precinct: number; count: number }[];
  readonly bottom: readonly { precinct: number; count: number }[];
}

const RANKING_COLUMNS: readonly TableColumn[] = [
  { key: 'precinct', header: 'Precinct', align: 'right' },
  { key: 'count', header: 'Incidents', align: 'right' },
];

export function buildPrecinctRanking(
  records: readonly EnrichedIncidentRecord[],
  n: number
): PrecinctRanking {
  const buckets = aggregateByPrecinct(records);
  const toRow = (bucket: { key: number; count: number }) => ({
    precinct: bucket.key,
    count: bucket.count,
  });
  return {
    top: topN(buckets, n).map(toRow),
    bottom: bottomN(buckets, n).map(toRow),
  };
}

export function registerPrecinctsCommand(parent: Command, getContext: ContextProvider): void {
  parent
    .command('precincts [csv]')
    .description('Precincts with the most and fewest incidents')
    .option('--top <n>', 'How many precincts in each list (default: report.top_n)')
    .action(async (csv: string | undefined, options: PrecinctOptions) => {
      await runCommand(getContext, 'report precincts', async (ctx) => {
        const n =
          options.top === undefined ? ctx.config.report.topN : parseWholeNumber(options.top, '--top');
        if (n < 1) {
          throw new ConfigurationError(`--top must be at least 1, got ${n}`);
        }
        const { enriched } = await loadEnrichedIncidents(ctx, csv);
        const ranking = buildPrecinctRanking(enriched, n);

        if (ctx.config.json) {
          printOutput(formatJson(ranking));
          return;
        }
        printOutput(`Top ${n} precincts\n${formatTable(ranking.top, RANKING_COLUMNS)}`);
        printOutput(`\nBottom ${n} precincts\n${formatTable(ranking.bottom, RANKING_COLUMNS)}`);
      });
    });
}
