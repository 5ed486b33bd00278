/**
 * Tests for incident CSV parsing and calendar derivation
 */

import { describe, it, expect } from 'vitest';
import { IncidentParseError } from '../../../core/errors.js';
import {
  parseCalendarDate,
  parseCSVLine,
  parseIncidentsCsv,
  parseTimeOfDay,
  splitCsvRecords,
} from '../../../ingestion/incident-parser.js';

const HEADER =
  'INCIDENT_KEY,OCCUR_DATE,OCCUR_TIME,BORO,LOC_OF_OCCUR_DESC,PRECINCT,JURISDICTION_CODE,' +
  'LOCATION_DESC,STATISTICAL_MURDER_FLAG,PERP_AGE_GROUP,PERP_SEX,PERP_RACE,VIC_AGE_GROUP,VIC_SEX,VIC_RACE';

function csv(...rows: string[]): string {
  return [HEADER, ...rows].join('\n');
}

describe('parseCSVLine', () => {
  it('splits plain fields', () => {
    expect(parseCSVLine('a,b,,c')).toEqual(['a', 'b', '', 'c']);
  });

  it('keeps commas and doubled quotes inside quoted fields', () => {
    expect(parseCSVLine('a,"b, c","d ""q"""')).toEqual(['a', 'b, c', 'd "q"']);
  });
});

describe('splitCsvRecords', () => {
  it('keeps line breaks inside quoted fields and records the starting line', () => {
    expect(splitCsvRecords('a,"x\r\ny"\r\nb,"say ""hi"""\nc')).toEqual([
      { line: 1, text: 'a,"x\ny"' },
      { line: 3, text: 'b,"say ""hi"""' },
      { line: 4, text: 'c' },
    ]);
  });
});

describe('parseCalendarDate', () => {
  it('derives year, month, day and weekday', () => {
    expect(parseCalendarDate('08/27/2006')).toEqual({ year: 2006, month: 8, day: 27, weekday: 0 });
    expect(parseCalendarDate('1/5/2021')).toEqual({ year: 2021, month: 1, day: 5, weekday: 2 });
  });

  it('accepts leap days and rejects impossible dates', () => {
    expect(parseCalendarDate('02/29/2020')).toEqual({ year: 2020, month: 2, day: 29, weekday: 6 });
    expect(parseCalendarDate('02/30/2019')).toBe('Invalid calendar date: 02/30/2019');
    expect(parseCalendarDate('13/01/2019')).toBe('Invalid calendar date: 13/01/2019');
  });
});

describe('parseTimeOfDay', () => {
  it('pads to HH:MM:SS', () => {
    expect(parseTimeOfDay('5:35:00')).toEqual({ hour: 5, time: '05:35:00' });
    expect(parseTimeOfDay('23:10')).toEqual({ hour: 23, time: '23:10:00' });
  });

  it('rejects out-of-range values', () => {
    expect(parseTimeOfDay('25:00:00')).toBe('Invalid time of day: 25:00:00');
    expect(parseTimeOfDay('10:60:00')).toBe('Invalid time of day: 10:60:00');
  });
});

describe('parseIncidentsCsv', () => {
  it('parses a complete row', () => {
    const { records, failures, totalRows } = parseIncidentsCsv(
      csv('1001,08/27/2006,05:35:00,BRONX,,52,0,"GROCERY/BODEGA, CORNER",false,18-24,M,BLACK,25-44,M,BLACK')
    );

    expect(totalRows).toBe(1);
    expect(failures).toEqual([]);
    expect(records).toEqual([
      {
        incidentKey: '1001',
        occurredAt: '2006-08-27',
        occurredTime: '05:35:00',
        region: 'BRONX',
        precinct: 52,
        jurisdictionCode: 0,
        locationDescription: 'GROCERY/BODEGA, CORNER',
        statisticalMurderFlag: false,
        perpetrator: { ageGroup: '18-24', sex: 'M', race: 'BLACK' },
        victim: { ageGroup: '25-44', sex: 'M', race: 'BLACK' },
        year: 2006,
        month: 8,
        day: 27,
        weekday: 0,
        hour: 5,
      },
    ]);
  });

  it('normalizes region labels and unrecorded values', () => {
    const { records } = parseIncidentsCsv(
      csv('1002,1/5/2021,23:10,  staten   island ,,121,,(null),true,(null),U,UNKNOWN,<18,F,WHITE HISPANIC')
    );

    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record?.region).toBe('STATEN ISLAND');
    expect(record?.occurredTime).toBe('23:10:00');
    expect(record?.hour).toBe(23);
    expect(record?.jurisdictionCode).toBeNull();
    expect(record?.locationDescription).toBeNull();
    expect(record?.statisticalMurderFlag).toBe(true);
    expect(record?.perpetrator).toEqual({ ageGroup: null, sex: null, race: null });
    expect(record?.victim).toEqual({ ageGroup: '<18', sex: 'F', race: 'WHITE HISPANIC' });
  });

  it('collects failures with line numbers instead of dropping rows', () => {
    const { records, failures, totalRows } = parseIncidentsCsv(
      csv(
        '1003,02/30/2019,10:00:00,QUEENS,,113,0,,false,,,,25-44,M,BLACK',
        '',
        '1004,03/01/2019,10:00:00,NEW JERSEY,,113,0,,false,,,,25-44,M,BLACK',
        '1005,03/01/2019,10:00:00,QUEENS,,abc,0,,false,,,,25-44,M,BLACK',
        '1006,03/01/2019,25:00:00,QUEENS,,113,0,,false,,,,25-44,M,BLACK',
        '1007,03/01/2019,10:00:00,QUEENS,,113,0,,false,,,,25-44,M,BLACK'
      )
    );

    expect(totalRows).toBe(5);
    expect(records.map((r) => r.incidentKey)).toEqual(['1007']);
    expect(failures).toEqual([
      { line: 2, incidentKey: '1003', reason: 'Invalid calendar date: 02/30/2019' },
      { line: 4, incidentKey: '1004', reason: 'Unrecognized region: "NEW JERSEY"' },
      { line: 5, incidentKey: '1005', reason: 'PRECINCT must be a positive integer' },
      { line: 6, incidentKey: '1006', reason: 'Invalid time of day: 25:00:00' },
    ]);
  });

  it('parses quoted fields that span lines', () => {
    const { records, failures, totalRows } = parseIncidentsCsv(
      csv(
        '1010,06/15/2010,14:30:00,BRONX,,40,0,"BAR\nLOUNGE",false,,,,25-44,M,BLACK',
        '1011,02/30/2019,10:00:00,QUEENS,,113,0,,false,,,,25-44,M,BLACK'
      )
    );

    expect(totalRows).toBe(2);
    expect(records.map((r) => [r.incidentKey, r.locationDescription])).toEqual([['1010', 'BAR\nLOUNGE']]);
    expect(failures).toEqual([
      { line: 4, incidentKey: '1011', reason: 'Invalid calendar date: 02/30/2019' },
    ]);
  });

  it('reports rows with missing fields', () => {
    const { failures } = parseIncidentsCsv(csv('1008,03/01/2019'));
    expect(failures).toHaveLength(1);
    expect(failures[0]?.line).toBe(2);
    expect(failures[0]?.incidentKey).toBe('1008');
  });

  it('accepts header names in any case and CRLF line endings', () => {
    const content =
      'incident_key,occur_date,occur_time,boro,precinct\r\n' + 'K1,06/15/2010,14:30:00,Brooklyn,75\r\n';
    const { records, failures } = parseIncidentsCsv(content);
    expect(failures).toEqual([]);
    expect(records[0]?.region).toBe('BROOKLYN');
    expect(records[0]?.victim).toEqual({ ageGroup: null, sex: null, race: null });
  });

  it('freezes parsed records', () => {
    const { records } = parseIncidentsCsv(
      csv('1009,06/15/2010,14:30:00,BRONX,,40,0,,false,,,,25-44,M,BLACK')
    );
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it('rejects a file without the required columns', () => {
    expect(() => parseIncidentsCsv('INCIDENT_KEY,OCCUR_DATE\n1,01/01/2020')).toThrow(IncidentParseError);
    try {
      parseIncidentsCsv('INCIDENT_KEY,OCCUR_DATE\n1,01/01/2020');
    } catch (error) {
      expect(error).toBeInstanceOf(IncidentParseError);
      if (error instanceof IncidentParseError) {
        expect(error.missingColumns).toEqual(['occur_time', 'boro', 'precinct']);
        expect(error.message).toBe(
          'Incident file is missing required columns: OCCUR_TIME, BORO, PRECINCT'
        );
      }
    }
  });

  it('rejects an empty file', () => {
    expect(() => parseIncidentsCsv('')).toThrow('Incident file has no header row');
  });
});
