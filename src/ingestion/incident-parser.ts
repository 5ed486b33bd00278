/**
 * Incident CSV Parser
 *
 * Turns the raw incident export into IncidentRecord values. Calendar fields
 * (year, month, day, weekday, hour) are derived here, once, and frozen with
 * the record. Rows that cannot be parsed are returned as failures alongside
 * the parsed records.
 *
 * Expected columns (case-insensitive):
 *   INCIDENT_KEY, OCCUR_DATE (MM/DD/YYYY), OCCUR_TIME (HH:MM[:SS]), BORO,
 *   PRECINCT, JURISDICTION_CODE, LOCATION_DESC, STATISTICAL_MURDER_FLAG,
 *   PERP_AGE_GROUP, PERP_SEX, PERP_RACE, VIC_AGE_GROUP, VIC_SEX, VIC_RACE
 *
 * Quoted fields may hold commas, doubled quotes and line breaks.
 *
 * @module ingestion/incident-parser
 */

import { z } from 'zod';
import { IncidentParseError, type RowParseFailure } from '../core/errors.js';
import { normalizeRegion, type Demographics, type IncidentRecord } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export const REQUIRED_COLUMNS = [
  'incident_key',
  'occur_date',
  'occur_time',
  'boro',
  'precinct',
] as const;

export interface ParseIncidentsResult {
  readonly records: readonly IncidentRecord[];
  readonly failures: readonly RowParseFailure[];
  /** Data rows seen, excluding the header and blank lines */
  readonly totalRows: number;
}

/**
 * Placeholder values the source uses for "not recorded"
 */
const NULL_MARKERS = new Set(['', '(null)', 'null', 'unknown', 'u']);

// ============================================================================
// Row Schema
// ============================================================================

const RawIncidentRowSchema = z.object({
  incident_key: z.string().trim().min(1, 'INCIDENT_KEY is empty'),
  occur_date: z
    .string()
    .trim()
    .regex(/^\d{1,2}\/\d{1,2}\/\d{4}$/, 'OCCUR_DATE must be MM/DD/YYYY'),
  occur_time: z
    .string()
    .trim()
    .regex(/^\d{1,2}:\d{2}(:\d{2})?$/, 'OCCUR_TIME must be HH:MM:SS'),
  boro: z.string(),
  precinct: z
    .string()
    .trim()
    .regex(/^\d+$/, 'PRECINCT must be a positive integer'),
  jurisdiction_code: z.string().optional(),
  location_desc: z.string().optional(),
  statistical_murder_flag: z.string().optional(),
  perp_age_group: z.string().optional(),
  perp_sex: z.string().optional(),
  perp_race: z.string().optional(),
  vic_age_group: z.string().optional(),
  vic_sex: z.string().optional(),
  vic_race: z.string().optional(),
});

type RawIncidentRow = z.infer<typeof RawIncidentRowSchema>;

// ============================================================================
// CSV
// ============================================================================

/**
 * Parse a CSV line with quoted fields ("a, b" and doubled "" quotes)
 */
export interface CsvRecord {
  /** 1-based line on which the record starts */
  readonly line: number;
  readonly text: string;
}

/**
 * Split CSV content into records. Line breaks inside quoted fields belong to
 * the field, so a record may span several physical lines.
 */
export function splitCsvRecords(content: string): CsvRecord[] {
  const normalized = content.replace(/\r\n?/g, '\n');
  const records: CsvRecord[] = [];
  let current = '';
  let line = 1;
  let startLine = 1;
  let inQuotes = false;

  for (const char of normalized) {
    if (char === '"') {
      // a doubled quote toggles twice and leaves the state unchanged
      inQuotes = !inQuotes;
    } else if (char === '\n') {
      line++;
      if (!inQuotes) {
        records.push({ line: startLine, text: current });
        current = '';
        startLine = line;
        continue;
      }
    }
    current += char;
  }

  records.push({ line: startLine, text: current });
  return records;
}

export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      values.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  values.push(current);
  return values;
}

// ============================================================================
// Field Normalization
// ============================================================================

function nullable(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return NULL_MARKERS.has(trimmed.toLowerCase()) ? null : trimmed;
}

function demographics(ageGroup?: string, sex?: string, race?: string): Demographics {
  return Object.freeze({
    ageGroup: nullable(ageGroup),
    sex: nullable(sex),
    race: nullable(race),
  });
}

function parseOptionalInt(value: string | undefined): number | null {
  const cleaned = nullable(value);
  if (cleaned === null) return null;
  const num = Number(cleaned);
  return Number.isInteger(num) ? num : null;
}

function parseFlag(value: string | undefined): boolean {
  const cleaned = value?.trim().toLowerCase();
  return cleaned === 'true' || cleaned === 'y' || cleaned === '1';
}

/**
 * Calendar parts of an MM/DD/YYYY date, or a reason it is invalid
 */
export function parseCalendarDate(
  raw: string
): { year: number; month: number; day: number; weekday: number } | string {
  const [monthStr, dayStr, yearStr] = raw.trim().split('/');
  const month = Number(monthStr);
  const day = Number(dayStr);
  const year = Number(yearStr);

  // weekday from the calendar date itself, independent of the local timezone
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return `Invalid calendar date: ${raw}`;
  }

  return { year, month, day, weekday: date.getUTCDay() };
}

/**
 * Hour and canonical HH:MM:SS of a time of day, or a reason it is invalid
 */
export function parseTimeOfDay(raw: string): { hour: number; time: string } | string {
  const [hourStr, minuteStr, secondStr = '0'] = raw.trim().split(':');
  const hour = Number(hourStr);
  const minute = Number(minuteStr);
  const second = Number(secondStr);

  if (hour > 23 || minute > 59 || second > 59) {
    return `Invalid time of day: ${raw}`;
  }

  const pad = (n: number) => String(n).padStart(2, '0');
  return { hour, time: `${pad(hour)}:${pad(minute)}:${pad(second)}` };
}

function toIncidentRecord(row: RawIncidentRow): IncidentRecord | string {
  const region = normalizeRegion(row.boro);
  if (region === null) {
    return `Unrecognized region: "${row.boro}"`;
  }

  const calendar = parseCalendarDate(row.occur_date);
  if (typeof calendar === 'string') {
    return calendar;
  }

  const timeOfDay = parseTimeOfDay(row.occur_time);
  if (typeof timeOfDay === 'string') {
    return timeOfDay;
  }

  const pad = (n: number) => String(n).padStart(2, '0');

  return Object.freeze({
    incidentKey: row.incident_key,
    occurredAt: `${calendar.year}-${pad(calendar.month)}-${pad(calendar.day)}`,
    occurredTime: timeOfDay.time,
    region,
    precinct: Number(row.precinct),
    jurisdictionCode: parseOptionalInt(row.jurisdiction_code),
    locationDescription: nullable(row.location_desc),
    statisticalMurderFlag: parseFlag(row.statistical_murder_flag),
    perpetrator: demographics(row.perp_age_group, row.perp_sex, row.perp_race),
    victim: demographics(row.vic_age_group, row.vic_sex, row.vic_race),
    year: calendar.year,
    month: calendar.month,
    day: calendar.day,
    weekday: calendar.weekday,
    hour: timeOfDay.hour,
  });
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse the incident CSV export.
 *
 * @throws IncidentParseError when the header is missing or lacks required columns
 */
export function parseIncidentsCsv(content: string): ParseIncidentsResult {
  const [headerRecord, ...rows] = splitCsvRecords(content);
  if (headerRecord === undefined || headerRecord.text.trim() === '') {
    throw new IncidentParseError('Incident file has no header row');
  }

  const headers = parseCSVLine(headerRecord.text.replace(/^\uFEFF/, '')).map((h) =>
    h.trim().toLowerCase()
  );
  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new IncidentParseError(
      `Incident file is missing required columns: ${missing.map((c) => c.toUpperCase()).join(', ')}`,
      missing
    );
  }

  const records: IncidentRecord[] = [];
  const failures: RowParseFailure[] = [];
  let totalRows = 0;

  for (const { line, text } of rows) {
    if (text.trim() === '') continue;
    totalRows++;

    const values = parseCSVLine(text);
    const raw: Record<string, string> = {};
    headers.forEach((header, j) => {
      const value = values[j];
      if (value !== undefined) {
        raw[header] = value;
      }
    });

    const incidentKey = nullable(raw.incident_key);
    const parsed = RawIncidentRowSchema.safeParse(raw);
    if (!parsed.success) {
      failures.push({
        line,
        incidentKey,
        reason: parsed.error.issues.map((issue) => issue.message).join('; '),
      });
      continue;
    }

    const record = toIncidentRecord(parsed.data);
    if (typeof record === 'string') {
      failures.push({ line, incidentKey, reason: record });
      continue;
    }

    records.push(record);
  }

  return { records, failures, totalRows };
}
