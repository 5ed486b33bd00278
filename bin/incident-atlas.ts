#!/usr/bin/env tsx
/**
 * Incident Atlas CLI Entry Point
 *
 * @module incident-atlas-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  CLI_NAME,
  EXIT_CODES,
  createCLILogger,
  loadConfig,
  registerExportCommand,
  registerPopulationCommands,
  registerReportCommands,
  type CommandContext,
} from '../src/cli/index.js';

// ============================================================================
// Global State
// ============================================================================

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parseYear(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a whole number.');
  }
  return Number(value);
}

function parsePolicy(value: string): 'exclude' | 'abort' {
  if (value !== 'exclude' && value !== 'abort') {
    throw new InvalidArgumentError('Must be exclude or abort.');
  }
  return value;
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  targetYear?: number;
  onUnmatched?: 'exclude' | 'abort';
}

function initializeContext(options: GlobalOptions): CommandContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      targetMaxYear: options.targetYear,
      onUnmatched: options.onUnmatched,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime: Date.now() };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Incident Atlas - population-normalized incident statistics')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .incident-atlasrc)')
    .option('--target-year <year>', 'Extend population series to this year', parseYear)
    .option('--on-unmatched <policy>', 'Incidents without population: exclude|abort', parsePolicy)
    .hook('preAction', (thisCommand) => {
      try {
        initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerPopulationCommands(program, getGlobalContext);
  registerReportCommands(program, getGlobalContext);
  registerExportCommand(program, getGlobalContext);

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  });
