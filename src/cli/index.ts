/**
 * Incident Atlas CLI
 *
 * Command-line interface for population series, aggregated incident reports,
 * trend lines and enriched exports.
 *
 * @module cli
 */

export * from './lib/index.js';
export * from './commands/index.js';

export const CLI_NAME = 'incident-atlas';

