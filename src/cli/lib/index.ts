/**
 * CLI Library Index
 *
 * @module cli/lib
 */

export {
  type CLIConfig,
  type LoadConfigOptions,
  DEFAULT_CONFIG,
  findConfigFile,
  parseConfigFile,
  parseWholeNumber,
  loadConfig,
} from './config.js';

export {
  type CommandContext,
  type ContextProvider,
  type ExitCode,
  EXIT_CODES,
  exitCodeFor,
  resolveIncidentsPath,
  loadEnrichedIncidents,
  runCommand,
} from './context.js';

export { CLILogger, createCLILogger } from './logger.js';

export { type NdjsonHeader, createHeader, serializeEnrichedIncidents } from './ndjson.js';

export {
  type OutputFormat,
  type TableColumn,
  type ReportRow,
  OUTPUT_FORMATS,
  isOutputFormat,
  parseOutputFormat,
  formatTable,
  formatJson,
  formatNdjson,
  formatCsv,
  formatOutput,
  formatters,
} from './output.js';
