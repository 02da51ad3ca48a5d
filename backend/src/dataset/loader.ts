import path from 'node:path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { DatasetError } from '../errors';
import { CellValue, RawTable } from '../types';

export const ALLOWED_EXTENSIONS = ['csv', 'json', 'xls', 'xlsx'] as const;

export type DatasetFormat = (typeof ALLOWED_EXTENSIONS)[number];

export function datasetFormat(filename: string): DatasetFormat | null {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return ALLOWED_EXTENSIONS.find((allowed) => allowed === ext) ?? null;
}

export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  // Nested JSON values are kept as their serialized text.
  return JSON.stringify(value);
}

/**
 * Decodes file bytes as UTF-8, falling back to Latin-1 for legacy exports
 * that are not valid UTF-8.
 */
export function decodeText(buffer: Buffer): string {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    text = buffer.toString('latin1');
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function parseCsv(buffer: Buffer): RawTable {
  const result = Papa.parse<unknown[]>(decodeText(buffer), {
    header: false,
    dynamicTyping: true,
    skipEmptyLines: true,
  });

  const fatal = result.errors.find((e) => e.type !== 'FieldMismatch');
  if (fatal && result.data.length === 0) {
    throw new DatasetError(`Could not parse CSV: ${fatal.message}`);
  }

  const [header = [], ...body] = result.data;
  return {
    columns: header.map((h) => String(h ?? '')),
    rows: body.map((row) => header.map((_, idx) => toCell(row[idx]))),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function recordsToTable(records: Record<string, unknown>[]): RawTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return {
    columns,
    rows: records.map((record) => columns.map((col) => toCell(record[col]))),
  };
}

function parseJson(buffer: Buffer): RawTable {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeText(buffer));
  } catch (err) {
    throw new DatasetError(
      `Could not parse JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (Array.isArray(parsed)) {
    return recordsToTable(parsed.filter(isPlainObject));
  }

  if (isPlainObject(parsed)) {
    // Column-oriented: { column: [values] } or { column: { rowKey: value } }
    const source = parsed;
    const columns = Object.keys(source);
    const rowKeys: string[] = [];
    const seen = new Set<string>();
    const series = columns.map((col) => {
      const values = source[col];
      const entries: Array<[string, unknown]> = Array.isArray(values)
        ? values.map((v, idx): [string, unknown] => [String(idx), v])
        : isPlainObject(values)
          ? Object.entries(values)
          : [['0', values]];
      for (const [key] of entries) {
        if (!seen.has(key)) {
          seen.add(key);
          rowKeys.push(key);
        }
      }
      return new Map(entries);
    });

    return {
      columns,
      rows: rowKeys.map((key) => series.map((values) => toCell(values.get(key)))),
    };
  }

  throw new DatasetError('JSON dataset must be an array of records or an object of columns.');
}

function parseSpreadsheet(buffer: Buffer): RawTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  } catch (err) {
    throw new DatasetError(
      `Could not parse spreadsheet: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new DatasetError('Spreadsheet has no worksheets.');
  }

  const data = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  const [header = [], ...body] = data;
  return {
    columns: header.map((h) => String(h ?? '')),
    rows: body.map((row) => header.map((_, idx) => toCell(row[idx]))),
  };
}

export function parseDataset(filename: string, buffer: Buffer): RawTable {
  const format = datasetFormat(filename);
  switch (format) {
    case 'csv':
      return parseCsv(buffer);
    case 'json':
      return parseJson(buffer);
    case 'xls':
    case 'xlsx':
      return parseSpreadsheet(buffer);
    default:
      throw new DatasetError(
        `Unsupported file type for "${filename}". Allowed: ${ALLOWED_EXTENSIONS.join(', ')}.`,
      );
  }
}
