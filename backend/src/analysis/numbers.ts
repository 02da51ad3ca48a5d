import { CellValue } from '../types';

/** Rounds to `digits` decimals; exact halves go to the even neighbour. */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded = diff > 0.5 ? floor + 1 : floor;
  if (diff === 0.5 && floor % 2 !== 0) rounded = floor + 1;
  return rounded / factor;
}

export function percent(part: number, total: number): number {
  return total === 0 ? 0 : roundTo((part / total) * 100, 1);
}

export function mean(values: number[]): number | null {
  if (!values.length) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function numericValue(value: CellValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// Text cells as the keyword and issue passes read them: missing cells are skipped.
export function textValue(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'number' && Number.isNaN(value)) return null;
  return String(value);
}
