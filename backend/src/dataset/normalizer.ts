import { isValid, parse, parseISO } from 'date-fns';
import { isSentimentColumn } from './columnRoles';
import { CellValue, DataRecord, RawTable, RecordTable } from '../types';

const DATE_NAME_MARKERS = ['date', 'time', 'created', 'timestamp'];

// Below this a numeric timestamp is read as Unix seconds, above it as milliseconds.
const EPOCH_SECONDS_LIMIT = 1e11;

export function isMissing(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

export function isDateColumnName(name: string): boolean {
  if (isSentimentColumn(name)) return false;
  return DATE_NAME_MARKERS.some((marker) => name.includes(marker));
}

// ISO-8601 text is only tried when it starts with a full year and month.
const ISO_PREFIX = /^[+-]?\d{4}-\d{2}/;
// An offset only counts after a clock time, so "2024-03-01" is not read as zoned.
const EXPLICIT_OFFSET = /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

// Tried in order after ISO-8601. Text matching none of them is not a date.
export const DATE_FORMATS: readonly string[] = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'yyyy/MM/dd',
  'yyyy/MM/dd HH:mm:ss',
  'MM/dd/yyyy',
  'MM/dd/yyyy HH:mm',
  'MM/dd/yyyy HH:mm:ss',
  'dd MMM yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'EEE, dd MMM yyyy HH:mm:ss xx',
];

// Wall-clock times without an offset are read as UTC so every host buckets them alike.
function wallClockAsUtc(local: Date): Date {
  return new Date(
    Date.UTC(
      local.getFullYear(),
      local.getMonth(),
      local.getDate(),
      local.getHours(),
      local.getMinutes(),
      local.getSeconds(),
      local.getMilliseconds(),
    ),
  );
}

function parseText(text: string): Date | null {
  const zoned = EXPLICIT_OFFSET.test(text);

  if (ISO_PREFIX.test(text)) {
    const iso = parseISO(text);
    if (isValid(iso)) return zoned ? iso : wallClockAsUtc(iso);
  }

  const reference = new Date(0);
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(text, pattern, reference);
    if (isValid(parsed)) return pattern.endsWith('xx') ? parsed : wallClockAsUtc(parsed);
  }
  return null;
}

/**
 * Timestamp coercion. Returns null for anything that cannot be read as a
 * date instead of throwing.
 */
export function parseTimestamp(value: CellValue | undefined): Date | null {
  if (value === null || value === undefined || typeof value === 'boolean') {
    return null;
  }
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const ms = Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value;
    const date = new Date(ms);
    return isValid(date) ? date : null;
  }

  const text = value.trim();
  return text ? parseText(text) : null;
}

function normalizeColumnNames(columns: string[]): string[] {
  const used = new Set<string>();
  return columns.map((raw) => {
    const base = String(raw).trim().toLowerCase();
    let name = base;
    let suffix = 1;
    while (used.has(name)) {
      name = `${base}_${suffix}`;
      suffix += 1;
    }
    used.add(name);
    return name;
  });
}

/**
 * Turns a loaded table into the canonical record table: empty rows and
 * columns dropped, names trimmed, lowercased and unique, date-like columns
 * coerced to timestamps (unparseable cells become null).
 */
export function normalizeTable(raw: RawTable): RecordTable {
  const rows = raw.rows.filter((row) =>
    raw.columns.some((_, idx) => !isMissing(row[idx])),
  );

  const keptIndexes = raw.columns
    .map((_, idx) => idx)
    .filter((idx) => rows.some((row) => !isMissing(row[idx])));

  const columns = normalizeColumnNames(keptIndexes.map((idx) => raw.columns[idx] ?? ''));

  const records = rows.map((row) => {
    const record: DataRecord = {};
    keptIndexes.forEach((sourceIdx, position) => {
      const name = columns[position];
      const cell = row[sourceIdx];
      const value = cell === undefined || isMissing(cell) ? null : cell;
      record[name] = isDateColumnName(name) ? parseTimestamp(value) : value;
    });
    return record;
  });

  return { columns, rows: records };
}
