/**
 * Region Population Table
 *
 * Long-form (year, region, population) table built once from per-region
 * series. Exactly one entry per (year, region) pair; read-only after
 * construction.
 *
 * @module population/region-table
 */

import { ConfigurationError } from '../core/errors.js';
import { REGION_IDS, type PopulationEntry, type PopulationSeries, type RegionId } from '../core/types.js';

function tableKey(year: number, region: string): string {
  return `${year}|${region}`;
}

function regionOrder(region: RegionId): number {
  return REGION_IDS.indexOf(region);
}

export class RegionPopulationTable {
  private readonly byKey: ReadonlyMap<string, PopulationEntry>;
  private readonly sortedEntries: readonly PopulationEntry[];

  /** Regions present in the table, in enumeration order */
  readonly regions: readonly RegionId[];
  readonly yearRange: { readonly start: number; readonly end: number };

  private constructor(
    entries: readonly PopulationEntry[],
    regions: readonly RegionId[],
    yearRange: { start: number; end: number }
  ) {
    const byKey = new Map<string, PopulationEntry>();
    for (const entry of entries) {
      byKey.set(tableKey(entry.year, entry.region), entry);
    }
    this.byKey = byKey;
    this.sortedEntries = Object.freeze(
      [...entries].sort((a, b) => a.year - b.year || regionOrder(a.region) - regionOrder(b.region))
    );
    this.regions = Object.freeze([...regions].sort((a, b) => regionOrder(a) - regionOrder(b)));
    this.yearRange = Object.freeze({ ...yearRange });
    Object.freeze(this);
  }

  /**
   * Union per-region series into one table.
   *
   * @throws ConfigurationError on an empty input, a duplicated region, or
   * series whose year ranges differ
   */
  static fromSeries(seriesList: readonly PopulationSeries[]): RegionPopulationTable {
    const first = seriesList[0];
    if (first === undefined) {
      throw new ConfigurationError('Cannot build a population table from zero series');
    }

    const seen = new Set<RegionId>();
    const entries: PopulationEntry[] = [];

    for (const series of seriesList) {
      if (seen.has(series.region)) {
        throw new ConfigurationError(`Duplicate population series for ${series.region}`, {
          region: series.region,
        });
      }
      if (series.startYear !== first.startYear || series.endYear !== first.endYear) {
        throw new ConfigurationError(
          `Series for ${series.region} covers ${series.startYear}-${series.endYear}, ` +
            `expected ${first.startYear}-${first.endYear}`,
          { region: series.region }
        );
      }
      seen.add(series.region);

      for (let year = series.startYear; year <= series.endYear; year++) {
        const population = series.points.get(year);
        if (population === undefined) {
          throw new ConfigurationError(`Series for ${series.region} has no value for ${year}`, {
            region: series.region,
            year,
          });
        }
        entries.push(Object.freeze({ year, region: series.region, population }));
      }
    }

    return new RegionPopulationTable(entries, [...seen], {
      start: first.startYear,
      end: first.endYear,
    });
  }

  get size(): number {
    return this.sortedEntries.length;
  }

  /**
   * Population for (year, region), or undefined when the pair is not covered
   */
  lookup(year: number, region: string): number | undefined {
    return this.byKey.get(tableKey(year, region))?.population;
  }

  has(year: number, region: string): boolean {
    return this.byKey.has(tableKey(year, region));
  }

  hasRegion(region: string): boolean {
    return (this.regions as readonly string[]).includes(region);
  }

  /**
   * All entries, sorted by year then region
   */
  entries(): readonly PopulationEntry[] {
    return this.sortedEntries;
  }

  /**
   * Reconstruct one region's series from the table
   */
  forRegion(region: RegionId): PopulationSeries | undefined {
    if (!this.hasRegion(region)) {
      return undefined;
    }

    const points = new Map<number, number>();
    for (const entry of this.sortedEntries) {
      if (entry.region === region) {
        points.set(entry.year, entry.population);
      }
    }

    return Object.freeze({
      region,
      startYear: this.yearRange.start,
      endYear: this.yearRange.end,
      points,
    });
  }
}
