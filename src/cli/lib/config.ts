/**
 * Incident Atlas CLI Configuration Management
 *
 * Loads configuration from .incident-atlasrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (INCIDENT_ATLAS_*)
 * 3. Config file (.incident-atlasrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../core/errors.js';
import type { UnmatchedPolicy } from '../../pipeline/enrichment-pipeline.js';
import { DEFAULT_SNAPSHOTS_PATH } from '../../population/snapshots.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Default incident CSV when a command is given none */
  readonly incidents: string | null;
  /** Census snapshot JSON */
  readonly snapshots: string;
  /** Directory for exports */
  readonly output: string;
}

export interface PopulationConfig {
  /** Last year the population series is extended to */
  readonly targetMaxYear: number;
}

export interface ReportConfig {
  /** N for top-N / bottom-N precinct rankings */
  readonly topN: number;
}

export interface EnrichmentConfig {
  readonly onUnmatched: UnmatchedPolicy;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly population: PopulationConfig;
  readonly report: ReportConfig;
  readonly enrichment: EnrichmentConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().positive().optional(),
    paths: z
      .object({
        incidents: z.string().optional(),
        snapshots: z.string().optional(),
        output: z.string().optional(),
      })
      .optional(),
    population: z
      .object({
        target_max_year: z.number().int().optional(),
      })
      .optional(),
    report: z
      .object({
        top_n: z.number().int().positive().optional(),
      })
      .optional(),
    enrichment: z
      .object({
        on_unmatched: z.enum(['exclude', 'abort']).optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFileSchema = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    incidents: null,
    snapshots: DEFAULT_SNAPSHOTS_PATH,
    output: './data/output',
  },

  population: {
    targetMaxYear: 2023,
  },

  report: {
    topN: 5,
  },

  enrichment: {
    onUnmatched: 'exclude',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.incident-atlasrc',
  '.incident-atlasrc.yaml',
  '.incident-atlasrc.yml',
  '.incident-atlasrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigurationError when the file is not valid YAML/JSON or has unknown keys
 */
export function parseConfigFile(filePath: string): ConfigFileSchema {
  const content = readFileSync(filePath, 'utf-8');

  let data: unknown;
  try {
    // YAML is a superset of JSON
    data = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues.join('; ')}`, {
      filePath,
      issues,
    });
  }
  return result.data;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[`INCIDENT_ATLAS_${name}`];
}

function getEnvBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

const WholeNumberSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform((value) => Number(value));

/**
 * Parse a whole number from a flag or environment variable. Signs, decimals
 * and trailing text are rejected rather than truncated.
 *
 * @throws ConfigurationError naming the setting
 */
export function parseWholeNumber(value: string, label: string): number {
  const result = WholeNumberSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`${label} must be a whole number, got ${value}`, { label, value });
  }
  return result.data;
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = getEnvVar(env, name);
  return value === undefined ? undefined : parseWholeNumber(value, `INCIDENT_ATLAS_${name}`);
}

function getEnvPolicy(env: NodeJS.ProcessEnv): UnmatchedPolicy | undefined {
  const value = getEnvVar(env, 'ON_UNMATCHED');
  if (value === undefined) return undefined;
  if (value === 'exclude' || value === 'abort') return value;
  throw new ConfigurationError(
    `INCIDENT_ATLAS_ON_UNMATCHED must be exclude or abort, got ${value}`
  );
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment to read INCIDENT_ATLAS_* from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    targetMaxYear?: number;
    topN?: number;
    onUnmatched?: UnmatchedPolicy;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for a missing explicit config file or invalid values
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { configPath });
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      incidents:
        getEnvVar(env, 'INCIDENTS') ?? fileConfig.paths?.incidents ?? DEFAULT_CONFIG.paths.incidents,
      snapshots:
        getEnvVar(env, 'SNAPSHOTS') ?? fileConfig.paths?.snapshots ?? DEFAULT_CONFIG.paths.snapshots,
      output: getEnvVar(env, 'OUTPUT_DIR') ?? fileConfig.paths?.output ?? DEFAULT_CONFIG.paths.output,
    },

    population: {
      targetMaxYear:
        options.overrides?.targetMaxYear ??
        getEnvNumber(env, 'TARGET_MAX_YEAR') ??
        fileConfig.population?.target_max_year ??
        DEFAULT_CONFIG.population.targetMaxYear,
    },

    report: {
      topN:
        options.overrides?.topN ??
        getEnvNumber(env, 'TOP_N') ??
        fileConfig.report?.top_n ??
        DEFAULT_CONFIG.report.topN,
    },

    enrichment: {
      onUnmatched:
        options.overrides?.onUnmatched ??
        getEnvPolicy(env) ??
        fileConfig.enrichment?.on_unmatched ??
        DEFAULT_CONFIG.enrichment.onUnmatched,
    },

    verbose: options.overrides?.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };

  if (config.report.topN < 1) {
    throw new ConfigurationError(`report.top_n must be at least 1, got ${config.report.topN}`);
  }

  return config;
}
