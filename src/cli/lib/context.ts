/**
 * Shared CLI command context
 *
 * Exit codes, the per-run context handed to every command, and the helper
 * that loads the incident file and runs the enrichment pipeline.
 *
 * @module cli/lib/context
 */

import { readFile } from 'node:fs/promises';
import {
  AggregationInconsistencyError,
  ConfigurationError,
  IncidentParseError,
  LookupError,
} from '../../core/errors.js';
import {
  runEnrichmentPipeline,
  type EnrichmentPipelineResult,
} from '../../pipeline/enrichment-pipeline.js';
import { loadSnapshots } from '../../population/snapshots.js';
import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';
import { printError } from './output.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
  UNKNOWN_COMMAND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (
    error instanceof LookupError ||
    error instanceof AggregationInconsistencyError ||
    error instanceof IncidentParseError
  ) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Context
// ============================================================================

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

export type ContextProvider = () => CommandContext;

/**
 * Resolve the incident file for a command: explicit argument first, then
 * paths.incidents from configuration
 *
 * @throws ConfigurationError when neither is set
 */
export function resolveIncidentsPath(config: CLIConfig, argument?: string): string {
  const path = argument ?? config.paths.incidents;
  if (!path) {
    throw new ConfigurationError(
      'No incident file given. Pass a CSV path or set paths.incidents in .incident-atlasrc'
    );
  }
  return path;
}

/**
 * Read the snapshots and incident file, then run the pipeline
 */
export async function loadEnrichedIncidents(
  ctx: CommandContext,
  csvPath?: string
): Promise<EnrichmentPipelineResult> {
  const path = resolveIncidentsPath(ctx.config, csvPath);
  const snapshots = await loadSnapshots(ctx.config.paths.snapshots);

  ctx.logger.debug('Reading incident file', { path });
  const csv = await readFile(path, 'utf-8');

  const result = runEnrichmentPipeline({
    csv,
    snapshots,
    targetMaxYear: ctx.config.population.targetMaxYear,
    onUnmatched: ctx.config.enrichment.onUnmatched,
  });

  if (result.parseFailures.length > 0) {
    ctx.logger.warn('Rows skipped during parsing', { count: result.parseFailures.length });
  }
  if (result.lookupFailures.length > 0) {
    ctx.logger.warn('Incidents excluded without a population entry', {
      count: result.lookupFailures.length,
    });
  }

  return result;
}

/**
 * Wrap a command body with start/end logging and error reporting.
 * Errors print as `Error: <message>` (or a JSON object with --json) and set
 * the exit code from exitCodeFor.
 */
export async function runCommand(
  getContext: ContextProvider,
  name: string,
  body: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  const ctx = getContext();
  ctx.logger.commandStart(name);
  try {
    await body(ctx);
    ctx.logger.commandEnd(true);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (ctx.config.json) {
      console.log(JSON.stringify({ error: message, name: error instanceof Error ? error.name : 'Error' }));
    } else {
      printError(message);
      if (error instanceof LookupError) {
        console.error(error.getSummary());
      }
    }
    ctx.logger.commandEnd(false);
    process.exitCode = exitCodeFor(error);
  }
}
