/**
 * Report Commands Index
 *
 * Registers all report subcommands:
 * - regions: Per-million rates by (year, region)
 * - time: Counts by hour, weekday, month or year
 * - precincts: Top-N / bottom-N precincts
 * - demographics: Counts by a demographic field
 * - trend: Linear trend per region
 */

import type { Command } from 'commander';
import type { ContextProvider } from '../../lib/context.js';
import { registerDemographicsCommand } from './demographics.js';
import { registerPrecinctsCommand } from './precincts.js';
import { registerRegionsCommand } from './regions.js';
import { registerTimeCommand } from './time.js';
import { registerTrendCommand } from './trend.js';

export function registerReportCommands(program: Command, getContext: ContextProvider): void {
  const report = program
    .command('report')
    .description('Aggregated incident statistics');

  registerRegionsCommand(report, getContext);
  registerTimeCommand(report, getContext);
  registerPrecinctsCommand(report, getContext);
  registerDemographicsCommand(report, getContext);
  registerTrendCommand(report, getContext);
}
