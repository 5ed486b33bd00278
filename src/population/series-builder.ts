/**
 * Population Series Builder
 *
 * Expands three census anchors for one region into a dense per-year series.
 * Years between the first two anchors interpolate on the first segment; every
 * later year, including years past the last anchor, lies on the line through
 * the second and third anchors.
 *
 * @module population/series-builder
 */

import { ConfigurationError } from '../core/errors.js';
import type { AnchorPoint, AnchorPoints, PopulationSeries, RegionId } from '../core/types.js';

/**
 * Check that anchors can define a piecewise-linear series.
 *
 * @throws ConfigurationError when there are not exactly three anchors, years
 * are not strictly increasing, or a population is not a non-negative integer
 */
export function validateAnchors(
  anchors: readonly AnchorPoint[],
  region?: RegionId
): asserts anchors is AnchorPoints {
  if (anchors.length !== 3) {
    throw new ConfigurationError(
      `Expected exactly 3 census anchors${region ? ` for ${region}` : ''}, got ${anchors.length}`,
      { region, anchorCount: anchors.length }
    );
  }

  for (const anchor of anchors) {
    if (!Number.isInteger(anchor.year)) {
      throw new ConfigurationError(`Anchor year must be an integer: ${anchor.year}`, {
        region,
        year: anchor.year,
      });
    }
    if (!Number.isInteger(anchor.population) || anchor.population < 0) {
      throw new ConfigurationError(
        `Anchor population must be a non-negative integer: ${anchor.population} (${anchor.year})`,
        { region, year: anchor.year, population: anchor.population }
      );
    }
  }

  for (let i = 1; i < anchors.length; i++) {
    const previous = anchors[i - 1];
    const current = anchors[i];
    if (previous !== undefined && current !== undefined && current.year <= previous.year) {
      throw new ConfigurationError(
        `Anchor years must be strictly increasing${region ? ` for ${region}` : ''}: ` +
          anchors.map((a) => a.year).join(', '),
        { region, years: anchors.map((a) => a.year) }
      );
    }
  }
}

/**
 * Population for `year` on the line through two anchors
 */
function onSegment(from: AnchorPoint, to: AnchorPoint, year: number): number {
  return from.population + ((to.population - from.population) * (year - from.year)) / (to.year - from.year);
}

/**
 * Interpolated (or extrapolated) population for a single year.
 * Callers are expected to have validated the anchors.
 */
export function interpolatePopulation(anchors: AnchorPoints, year: number): number {
  const [first, second, third] = anchors;
  if (year <= second.year) {
    return onSegment(first, second, year);
  }
  // second segment, extended past the last anchor on the same line
  return onSegment(second, third, year);
}

/**
 * Build the dense series covering [anchors[0].year, targetMaxYear].
 *
 * @param region - Region the series belongs to
 * @param anchors - Census anchors ordered by year
 * @param targetMaxYear - Last year to emit; may lie past the last anchor
 * @throws ConfigurationError for malformed anchors or a target before the first anchor
 *
 * @example
 * ```typescript
 * const series = buildPopulationSeries('QUEENS', [
 *   { year: 2000, population: 100 },
 *   { year: 2010, population: 200 },
 *   { year: 2020, population: 400 },
 * ], 2023);
 * series.points.get(2023); // 460
 * ```
 */
export function buildPopulationSeries(
  region: RegionId,
  anchors: readonly AnchorPoint[],
  targetMaxYear: number
): PopulationSeries {
  validateAnchors(anchors, region);

  const startYear = anchors[0].year;
  if (!Number.isInteger(targetMaxYear) || targetMaxYear < startYear) {
    throw new ConfigurationError(
      `Target year ${targetMaxYear} precedes the first census anchor ${startYear} for ${region}`,
      { region, targetMaxYear, startYear }
    );
  }

  const points = new Map<number, number>();
  for (let year = startYear; year <= targetMaxYear; year++) {
    points.set(year, interpolatePopulation(anchors, year));
  }

  return Object.freeze({
    region,
    startYear,
    endYear: targetMaxYear,
    points,
  });
}

/**
 * Population for a year, or undefined outside the series range
 */
export function populationAt(series: PopulationSeries, year: number): number | undefined {
  return series.points.get(year);
}
