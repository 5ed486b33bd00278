/**
 * Tests for the (year, region) population join
 */

import { describe, it, expect } from 'vitest';
import { LookupError } from '../../../core/errors.js';
import {
  assertFullyEnriched,
  enrichIncident,
  enrichIncidents,
} from '../../../enrichment/incident-enricher.js';
import { RegionPopulationTable } from '../../../population/region-table.js';
import { buildPopulationSeries } from '../../../population/series-builder.js';
import { DOUBLING_ANCHORS, makeIncident } from '../../utils/factories.js';

// QUEENS and BRONX only
const table = RegionPopulationTable.fromSeries([
  buildPopulationSeries('QUEENS', DOUBLING_ANCHORS, 2023),
  buildPopulationSeries(
    'BRONX',
    [
      { year: 2000, population: 1000 },
      { year: 2010, population: 1000000 },
      { year: 2020, population: 1000000 },
    ],
    2023
  ),
]);

describe('enrichIncident', () => {
  it('attaches the table population', () => {
    const result = enrichIncident(makeIncident({ region: 'QUEENS', year: 2015 }), table);
    expect(result.status).toBe('matched');
    if (result.status === 'matched') {
      expect(result.record.population).toBe(300);
      expect(result.record.region).toBe('QUEENS');
      expect(Object.isFrozen(result.record)).toBe(true);
    }
  });

  it('reports years outside the covered range', () => {
    const result = enrichIncident(
      makeIncident({ incidentKey: 'late', region: 'QUEENS', year: 2024 }),
      table
    );
    expect(result).toEqual({
      status: 'unmatched',
      failure: { incidentKey: 'late', year: 2024, region: 'QUEENS', reason: 'year_out_of_range' },
    });
  });

  it('reports regions the table does not hold', () => {
    const result = enrichIncident(
      makeIncident({ incidentKey: 'bk', region: 'BROOKLYN', year: 2010 }),
      table
    );
    expect(result).toEqual({
      status: 'unmatched',
      failure: { incidentKey: 'bk', year: 2010, region: 'BROOKLYN', reason: 'unknown_region' },
    });
  });
});

describe('enrichIncidents', () => {
  const records = [
    makeIncident({ incidentKey: 'a', region: 'QUEENS', year: 2005 }),
    makeIncident({ incidentKey: 'b', region: 'QUEENS', year: 1999 }),
    makeIncident({ incidentKey: 'c', region: 'BRONX', year: 2010 }),
    makeIncident({ incidentKey: 'd', region: 'STATEN ISLAND', year: 2010 }),
  ];
  const report = enrichIncidents(records, table);

  it('returns one result per input in order', () => {
    expect(report.results.map((r) => r.status)).toEqual(['matched', 'unmatched', 'matched', 'unmatched']);
  });

  it('splits matched records and failures', () => {
    expect(report.enriched.map((r) => [r.incidentKey, r.population])).toEqual([
      ['a', 150],
      ['c', 1000000],
    ]);
    expect(report.failures.map((f) => [f.incidentKey, f.reason])).toEqual([
      ['b', 'year_out_of_range'],
      ['d', 'unknown_region'],
    ]);
  });

  it('never emits a record for a failed lookup', () => {
    const enrichedKeys = new Set(report.enriched.map((r) => r.incidentKey));
    for (const failure of report.failures) {
      expect(enrichedKeys.has(failure.incidentKey)).toBe(false);
    }
    expect(report.enriched.length + report.failures.length).toBe(records.length);
  });

  it('handles an empty input', () => {
    expect(enrichIncidents([], table)).toEqual({ results: [], enriched: [], failures: [] });
  });
});

describe('assertFullyEnriched', () => {
  it('returns the records when every lookup matched', () => {
    const report = enrichIncidents([makeIncident({ region: 'QUEENS', year: 2010 })], table);
    expect(assertFullyEnriched(report)).toHaveLength(1);
  });

  it('throws a LookupError carrying every failure', () => {
    const report = enrichIncidents(
      [
        makeIncident({ incidentKey: 'x', region: 'QUEENS', year: 2030 }),
        makeIncident({ incidentKey: 'y', region: 'QUEENS', year: 2030 }),
        makeIncident({ incidentKey: 'z', region: 'QUEENS', year: 2010 }),
      ],
      table
    );

    expect(() => assertFullyEnriched(report)).toThrow(LookupError);
    expect(() => assertFullyEnriched(report)).toThrow('2 of 3 incidents have no population entry');

    try {
      assertFullyEnriched(report);
    } catch (error) {
      if (!(error instanceof LookupError)) throw error;
      expect(error.failures).toHaveLength(2);
      expect(error.getSummary()).toBe(
        '2 incidents could not be enriched:\n  2030/QUEENS (year_out_of_range): 2'
      );
    }
  });
});
