/**
 * NDJSON Export Utilities
 *
 * NDJSON (Newline-Delimited JSON) format:
 * - Line 1: Header object with schema version, type, count, timestamp
 * - Lines 2+: One enriched incident per line
 *
 * @module cli/lib/ndjson
 */

import type { EnrichedIncidentRecord } from '../../core/types.js';

/**
 * NDJSON header schema - first line of every export
 */
export interface NdjsonHeader {
  readonly _schema: 'v1';
  readonly _type: 'EnrichedIncident';
  readonly _count: number;
  readonly _extracted: string; // ISO 8601 timestamp
  readonly _description: string;
}

export function createHeader(count: number, extractedAt: Date = new Date()): NdjsonHeader {
  return {
    _schema: 'v1',
    _type: 'EnrichedIncident',
    _count: count,
    _extracted: extractedAt.toISOString(),
    _description: 'Incident records joined with interpolated regional population',
  };
}

/**
 * Serialize enriched incidents with a header line and a trailing newline
 */
export function serializeEnrichedIncidents(
  records: readonly EnrichedIncidentRecord[],
  extractedAt: Date = new Date()
): string {
  const lines = [JSON.stringify(createHeader(records.length, extractedAt))];
  for (const record of records) {
    lines.push(JSON.stringify(record));
  }
  return lines.join('\n') + '\n';
}
