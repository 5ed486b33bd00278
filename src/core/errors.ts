/**
 * Incident Atlas Error Types
 *
 * Structured error classes for the enrichment pipeline. Configuration errors
 * are fatal; lookup and parse failures are collected per record and only
 * become exceptions when a caller chooses to abort.
 */

import type { RegionId } from './types.js';

/**
 * Error thrown when census anchors, snapshot constants or the config file
 * are malformed. Raised before any series is built.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Why an incident could not be joined onto the population table
 */
export type LookupFailureReason = 'year_out_of_range' | 'unknown_region';

/**
 * Unmatched (year, region) key for a single incident
 */
export interface LookupFailure {
  readonly incidentKey: string;
  readonly year: number;
  readonly region: string;
  readonly reason: LookupFailureReason;
}

/**
 * Error thrown when a caller requires every incident to be enriched and
 * at least one (year, region) key is missing from the population table.
 *
 * RECOVERY:
 * - Extend population.targetMaxYear to cover the latest incident year
 * - Check the region labels in the incident file
 * - Use onUnmatched: exclude to keep the matched records only
 */
export class LookupError extends Error {
  constructor(
    message: string,
    public readonly failures: readonly LookupFailure[]
  ) {
    super(message);
    this.name = 'LookupError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LookupError);
    }
  }

  /**
   * Distinct missing keys with the number of incidents affected
   */
  getSummary(): string {
    const counts = new Map<string, number>();
    for (const failure of this.failures) {
      const key = `${failure.year}/${failure.region} (${failure.reason})`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const lines = [`${this.failures.length} incidents could not be enriched:`];
    for (const [key, count] of [...counts.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`  ${key}: ${count}`);
    }
    return lines.join('\n');
  }
}

/**
 * Conflicting populations observed for one (year, region) group
 */
export interface PopulationConflict {
  readonly year: number;
  readonly region: RegionId;
  readonly populations: readonly number[];
}

/**
 * Error thrown when records sharing a (year, region) key carry different
 * population values. Indicates an enrichment bug upstream.
 */
export class AggregationInconsistencyError extends Error {
  constructor(
    message: string,
    public readonly conflicts: readonly PopulationConflict[]
  ) {
    super(message);
    this.name = 'AggregationInconsistencyError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AggregationInconsistencyError);
    }
  }
}

/**
 * Input row that could not be turned into an incident record
 */
export interface RowParseFailure {
  /** 1-based line number in the source file (header is line 1) */
  readonly line: number;
  readonly incidentKey: string | null;
  readonly reason: string;
}

/**
 * Error thrown for an unrecoverable problem with the incident file itself
 * (missing header, missing required columns).
 */
export class IncidentParseError extends Error {
  constructor(
    message: string,
    public readonly missingColumns: readonly string[] = []
  ) {
    super(message);
    this.name = 'IncidentParseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IncidentParseError);
    }
  }
}
