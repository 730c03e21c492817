/**
 * Input adapter: plain objects → DataRecords.
 */

import { MISSING, type DataRecord, type RawValue } from './table-spec.js';

/**
 * Normalize one field value:
 * - null, undefined, NaN and blank strings → MISSING
 * - booleans → "true" / "false"
 * - numbers and strings pass through
 * - anything else → its string form
 */
export function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined || value === MISSING) return MISSING;
  if (typeof value === 'number') return Number.isNaN(value) ? MISSING : value;
  if (typeof value === 'string') return value.trim() === '' ? MISSING : value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

/**
 * Convert plain row objects (e.g., parsed JSON) into records. Field order is
 * preserved.
 */
export function toRecords(rows: readonly Readonly<Record<string, unknown>>[]): DataRecord[] {
  return rows.map(row => {
    const record: Record<string, RawValue> = {};
    for (const [field, value] of Object.entries(row)) {
      record[field] = toRawValue(value);
    }
    return record;
  });
}

/**
 * Extract one field across records; absent fields read as MISSING.
 */
export function column(records: readonly DataRecord[], field: string): RawValue[] {
  return records.map(r => r[field] ?? MISSING);
}
