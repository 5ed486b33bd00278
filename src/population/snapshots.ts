/**
 * Census Snapshot Registry
 *
 * Loads the fixed decennial census figures from src/data/census-snapshots.json,
 * validates them, and turns them into the region population table.
 *
 * @module population/snapshots
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import {
  REGION_IDS,
  type AnchorPoint,
  type PopulationSeries,
  type PopulationSnapshot,
  type RegionId,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { RegionPopulationTable } from './region-table.js';
import { buildPopulationSeries, validateAnchors } from './series-builder.js';

const logger = createLogger({ module: 'snapshots' });

export const DEFAULT_SNAPSHOTS_PATH = fileURLToPath(
  new URL('../data/census-snapshots.json', import.meta.url)
);

// ============================================================================
// Schema
// ============================================================================

export const PopulationSnapshotSchema = z.object({
  region: z.enum(REGION_IDS),
  year: z.number().int(),
  population: z.number().int().nonnegative(),
});

export const CensusSnapshotFileSchema = z.object({
  metadata: z
    .object({
      description: z.string().optional(),
      source: z.string().optional(),
      anchorYears: z.array(z.number().int()).optional(),
    })
    .optional(),
  snapshots: z.array(PopulationSnapshotSchema).min(1, 'At least one snapshot is required'),
});

export type CensusSnapshotFile = z.infer<typeof CensusSnapshotFileSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate parsed snapshot JSON
 *
 * @throws ConfigurationError with the zod issues when the shape is wrong
 */
export function parseSnapshotFile(data: unknown): readonly PopulationSnapshot[] {
  const result = CensusSnapshotFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid census snapshot file: ${issues.join('; ')}`, { issues });
  }
  return Object.freeze(result.data.snapshots.map((snapshot) => Object.freeze(snapshot)));
}

/**
 * Read and validate a snapshot file
 */
export async function loadSnapshots(
  filePath: string = DEFAULT_SNAPSHOTS_PATH
): Promise<readonly PopulationSnapshot[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read census snapshot file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Census snapshot file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  const snapshots = parseSnapshotFile(data);
  logger.debug('Loaded census snapshots', { filePath, count: snapshots.length });
  return snapshots;
}

// ============================================================================
// Table Construction
// ============================================================================

/**
 * Group snapshots into per-region anchor lists sorted by year
 */
export function groupAnchorsByRegion(
  snapshots: readonly PopulationSnapshot[]
): Map<RegionId, AnchorPoint[]> {
  const grouped = new Map<RegionId, AnchorPoint[]>();
  for (const snapshot of snapshots) {
    const anchors = grouped.get(snapshot.region) ?? [];
    anchors.push({ year: snapshot.year, population: snapshot.population });
    grouped.set(snapshot.region, anchors);
  }
  for (const anchors of grouped.values()) {
    anchors.sort((a, b) => a.year - b.year);
  }
  return grouped;
}

/**
 * Build the region population table from snapshot constants.
 *
 * Every region of the enumeration must have anchors, and every region's
 * anchors are validated before any series is built, so a misconfigured
 * constant aborts the whole run up front.
 *
 * @throws ConfigurationError on malformed anchors or a target before the first anchor
 */
export function buildRegionPopulationTable(
  snapshots: readonly PopulationSnapshot[],
  targetMaxYear: number
): RegionPopulationTable {
  const grouped = groupAnchorsByRegion(snapshots);
  if (grouped.size === 0) {
    throw new ConfigurationError('No census snapshots supplied');
  }

  const missing = REGION_IDS.filter((region) => !grouped.has(region));
  if (missing.length > 0) {
    throw new ConfigurationError(`Census snapshots missing for regions: ${missing.join(', ')}`, {
      missing,
    });
  }

  for (const [region, anchors] of grouped) {
    validateAnchors(anchors, region);
  }

  const series: PopulationSeries[] = [];
  for (const region of REGION_IDS) {
    const anchors = grouped.get(region);
    if (anchors !== undefined) {
      series.push(buildPopulationSeries(region, anchors, targetMaxYear));
    }
  }

  const table = RegionPopulationTable.fromSeries(series);
  logger.info('Built region population table', {
    regions: table.regions.length,
    startYear: table.yearRange.start,
    endYear: table.yearRange.end,
    entries: table.size,
  });
  return table;
}
