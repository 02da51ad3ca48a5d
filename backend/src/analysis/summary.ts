import path from 'node:path';
import { CellValue, RecordTable } from '../types';
import { roundTo } from './numbers';

export type ColumnType = 'number' | 'string' | 'boolean' | 'datetime' | 'mixed' | 'empty';

export type ColumnDetail = {
  name: string;
  type: ColumnType;
  nonNull: number;
  nulls: number;
};

export type NumericStats = {
  column: string;
  count: number;
  mean: number;
  std: number | null;
  min: number;
  q25: number;
  median: number;
  q75: number;
  max: number;
};

export type CategoricalStats = {
  column: string;
  count: number;
  unique: number;
  top: string;
  freq: number;
};

export type DatasetSummary = {
  fileName: string;
  totalRows: number;
  totalColumns: number;
  columns: ColumnDetail[];
  numeric: NumericStats[];
  categorical: CategoricalStats[];
};

function cellType(value: CellValue): ColumnType {
  if (value instanceof Date) return 'datetime';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  return 'string';
}

export function inferColumnType(values: CellValue[]): ColumnType {
  const present = values.filter((v) => v !== null);
  if (!present.length) return 'empty';
  const types = new Set(present.map(cellType));
  return types.size > 1 ? 'mixed' : cellType(present[0]);
}

/** Linear-interpolated quantile of an ascending array. */
export function quantile(sorted: number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function describeNumeric(column: string, values: number[]): NumericStats {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const avg = sorted.reduce((s, v) => s + v, 0) / count;
  const std =
    count > 1
      ? Math.sqrt(sorted.reduce((s, v) => s + (v - avg) ** 2, 0) / (count - 1))
      : null;

  return {
    column,
    count,
    mean: avg,
    std,
    min: sorted[0],
    q25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q75: quantile(sorted, 0.75),
    max: sorted[count - 1],
  };
}

export function describeCategorical(column: string, values: string[]): CategoricalStats {
  const freq = new Map<string, number>();
  for (const value of values) {
    freq.set(value, (freq.get(value) ?? 0) + 1);
  }

  let top = '';
  let topCount = 0;
  for (const [value, count] of freq) {
    if (count > topCount) {
      top = value;
      topCount = count;
    }
  }

  return { column, count: values.length, unique: freq.size, top, freq: topCount };
}

function stringify(value: CellValue): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Column-level digest of a dataset: inferred types, null counts and
 * descriptive statistics for numeric and text-like columns.
 */
export function summarizeDataset(table: RecordTable, fileName: string): DatasetSummary {
  const columns: ColumnDetail[] = [];
  const numeric: NumericStats[] = [];
  const categorical: CategoricalStats[] = [];

  for (const name of table.columns) {
    const values = table.rows.map((row) => row[name] ?? null);
    const present = values.filter((v): v is Exclude<CellValue, null> => v !== null);
    const type = inferColumnType(values);

    columns.push({ name, type, nonNull: present.length, nulls: values.length - present.length });

    if (type === 'number') {
      numeric.push(
        describeNumeric(
          name,
          present.filter((v): v is number => typeof v === 'number'),
        ),
      );
    } else if (type === 'string' || type === 'mixed') {
      categorical.push(describeCategorical(name, present.map(stringify)));
    }
  }

  return {
    fileName: path.basename(fileName),
    totalRows: table.rows.length,
    totalColumns: table.columns.length,
    columns,
    numeric,
    categorical,
  };
}

function fmt(value: number | null): string {
  return value === null ? 'n/a' : String(roundTo(value, 3));
}

/** Plain-text rendering handed to the chat model as its only context. */
export function formatSummaryForLlm(summary: DatasetSummary): string {
  const columnLines = summary.columns.map(
    (c) => `${c.name}: ${c.type}, ${c.nonNull} non-null, ${c.nulls} null`,
  );

  const numericLines = summary.numeric.length
    ? summary.numeric.map(
        (n) =>
          `${n.column}: count=${n.count} mean=${fmt(n.mean)} std=${fmt(n.std)} ` +
          `min=${fmt(n.min)} 25%=${fmt(n.q25)} 50%=${fmt(n.median)} 75%=${fmt(n.q75)} max=${fmt(n.max)}`,
      )
    : ['No numerical data.'];

  const categoricalLines = summary.categorical.length
    ? summary.categorical.map(
        (c) => `${c.column}: count=${c.count} unique=${c.unique} top="${c.top}" freq=${c.freq}`,
      )
    : ['No categorical data.'];

  return [
    `Here is a summary of the data from the file '${summary.fileName}':`,
    '',
    '--- FILE INFO ---',
    `Total Rows: ${summary.totalRows}`,
    `Total Columns: ${summary.totalColumns}`,
    '',
    '--- COLUMN DETAILS (Name, Type, Nulls) ---',
    ...columnLines,
    '',
    '--- NUMERICAL DATA SUMMARY ---',
    ...numericLines,
    '',
    '--- CATEGORICAL DATA SUMMARY ---',
    ...categoricalLines,
  ].join('\n');
}
