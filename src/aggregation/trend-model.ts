/**
 * Linear Trend Model
 *
 * Ordinary least squares line over yearly incident counts or per-capita
 * rates, one model per region.
 *
 * @module aggregation/trend-model
 */

import { REGION_IDS, type EnrichedIncidentRecord, type RegionId } from '../core/types.js';
import { aggregateByYearRegion } from './aggregation-engine.js';

export interface TrendPoint {
  readonly x: number;
  readonly y: number;
}

export interface LinearTrend {
  readonly slope: number;
  readonly intercept: number;
  /** Coefficient of determination; 1 when every y is equal */
  readonly rSquared: number;
  readonly n: number;
}

export type TrendMetric = 'count' | 'rate';

export interface RegionTrend {
  readonly region: RegionId;
  readonly metric: TrendMetric;
  readonly points: readonly TrendPoint[];
  readonly trend: LinearTrend;
}

/**
 * Fit y = slope * x + intercept
 *
 * @throws RangeError with fewer than two points or when every x is equal
 */
export function fitLinearTrend(points: readonly TrendPoint[]): LinearTrend {
  const n = points.length;
  if (n < 2) {
    throw new RangeError(`A linear trend needs at least 2 points, got ${n}`);
  }

  const meanX = points.reduce((sum, p) => sum + p.x, 0) / n;
  const meanY = points.reduce((sum, p) => sum + p.y, 0) / n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const { x, y } of points) {
    sxx += (x - meanX) ** 2;
    sxy += (x - meanX) * (y - meanY);
    syy += (y - meanY) ** 2;
  }

  if (sxx === 0) {
    throw new RangeError('A linear trend needs at least 2 distinct x values');
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  const rSquared = syy === 0 ? 1 : (sxy * sxy) / (sxx * syy);

  return { slope, intercept, rSquared, n };
}

export function predict(trend: LinearTrend, x: number): number {
  return trend.slope * x + trend.intercept;
}

/**
 * Fit one trend per region over its yearly counts or rates.
 * Regions with fewer than two observed years are skipped.
 */
export function yearlyTrends(
  records: readonly EnrichedIncidentRecord[],
  metric: TrendMetric = 'count'
): RegionTrend[] {
  const byRegion = new Map<RegionId, TrendPoint[]>();
  for (const bucket of aggregateByYearRegion(records)) {
    const points = byRegion.get(bucket.key.region) ?? [];
    points.push({ x: bucket.key.year, y: metric === 'rate' ? bucket.rate : bucket.count });
    byRegion.set(bucket.key.region, points);
  }

  const trends: RegionTrend[] = [];
  for (const region of REGION_IDS) {
    const points = byRegion.get(region);
    if (points === undefined || new Set(points.map((p) => p.x)).size < 2) {
      continue;
    }
    trends.push({ region, metric, points, trend: fitLinearTrend(points) });
  }
  return trends;
}
