/**
 * Export Command
 *
 * Writes enriched incidents as NDJSON. Rows that failed to parse or had no
 * population entry are counted in the summary (and listed with --verbose).
 *
 * Usage:
 *   incident-atlas export [csv] [--out <path>]
 */

import type { Command } from 'commander';
import { join } from 'node:path';
import { atomicWriteFile } from '../../../core/utils/atomic-write.js';
import { loadEnrichedIncidents, runCommand, type ContextProvider } from '../../lib/context.js';
import { serializeEnrichedIncidents } from '../../lib/ndjson.js';
import { formatJson, printOutput } from '../../lib/output.js';

interface ExportOptions {
  readonly out?: string;
}

export function registerExportCommand(program: Command, getContext: ContextProvider): void {
  program
    .command('export [csv]')
    .description('Write enriched incidents as NDJSON')
    .option('--out <path>', 'Output file (default: <paths.output>/enriched-incidents.ndjson)')
    .action(async (csv: string | undefined, options: ExportOptions) => {
      await runCommand(getContext, 'export', async (ctx) => {
        const result = await loadEnrichedIncidents(ctx, csv);
        const outPath = options.out ?? join(ctx.config.paths.output, 'enriched-incidents.ndjson');

        await atomicWriteFile(outPath, serializeEnrichedIncidents(result.enriched));

        ctx.logger.failures(result.parseFailures, result.lookupFailures);

        const summary = {
          path: outPath,
          written: result.enriched.length,
          parseFailures: result.parseFailures.length,
          lookupFailures: result.lookupFailures.length,
        };
        if (ctx.config.json) {
          printOutput(formatJson(summary));
        } else {
          printOutput(
            `Wrote ${summary.written} incidents to ${outPath} ` +
              `(${summary.parseFailures} unparseable rows, ${summary.lookupFailures} without population)`
          );
        }
      });
    });
}
