/**
 * Population Commands Index
 *
 * Registers population subcommands:
 * - series: Dense interpolated population table
 */

import type { Command } from 'commander';
import type { ContextProvider } from '../../lib/context.js';
import { registerSeriesCommand } from './series.js';

export function registerPopulationCommands(program: Command, getContext: ContextProvider): void {
  const population = program
    .command('population')
    .description('Census-derived population series');

  registerSeriesCommand(population, getContext);
}
