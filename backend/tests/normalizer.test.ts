import { describe, it, expect } from 'vitest';
import { isDateColumnName, isMissing, normalizeTable, parseTimestamp } from '../src/dataset/normalizer';

describe('normalizeTable', () => {
  it('drops empty rows and columns and normalizes names', () => {
    const table = normalizeTable({
      columns: [' Review ', 'Empty', 'LIKES'],
      rows: [
        ['good', null, 3],
        [null, null, null],
        ['bad', null, null],
      ],
    });

    expect(table.columns).toEqual(['review', 'likes']);
    expect(table.rows).toEqual([
      { review: 'good', likes: 3 },
      { review: 'bad', likes: null },
    ]);
  });

  it('keeps column names unique after lowercasing', () => {
    const table = normalizeTable({
      columns: ['Text', 'text ', 'TEXT'],
      rows: [['a', 'b', 'c']],
    });
    expect(table.columns).toEqual(['text', 'text_1', 'text_2']);
    expect(table.rows[0]).toEqual({ text: 'a', text_1: 'b', text_2: 'c' });
  });

  it('parses date-like columns and nulls unparseable values', () => {
    const table = normalizeTable({
      columns: ['Created_At', 'review'],
      rows: [
        ['2024-03-01', 'first'],
        ['not a date', 'second'],
      ],
    });

    const first = table.rows[0].created_at;
    expect(first).toBeInstanceOf(Date);
    expect(first instanceof Date ? first.getTime() : null).toBe(Date.UTC(2024, 2, 1));
    expect(table.rows[1].created_at).toBeNull();
    expect(table.rows[1].review).toBe('second');
  });

  it('nulls labels in a date column rather than inventing dates', () => {
    const table = normalizeTable({
      columns: ['date', 'review'],
      rows: [
        ['2024-03-01', 'a'],
        ['2024-03-02', 'b'],
        ['week 3', 'c'],
      ],
    });
    expect(table.rows.map((r) => r.date)).toEqual([
      new Date(Date.UTC(2024, 2, 1)),
      new Date(Date.UTC(2024, 2, 2)),
      null,
    ]);
  });

  it('keeps a date column whose values all fail to parse', () => {
    const table = normalizeTable({
      columns: ['date', 'review'],
      rows: [
        ['soon', 'a'],
        ['later', 'b'],
      ],
    });
    expect(table.columns).toEqual(['date', 'review']);
    expect(table.rows.map((r) => r.date)).toEqual([null, null]);
  });

  it('returns an empty table when every row is missing', () => {
    const table = normalizeTable({ columns: ['a', 'b'], rows: [[null, null]] });
    expect(table).toEqual({ columns: [], rows: [] });
  });
});

describe('parseTimestamp', () => {
  it('reads small numbers as epoch seconds and large ones as milliseconds', () => {
    expect(parseTimestamp(1_700_000_000)?.getTime()).toBe(1_700_000_000_000);
    expect(parseTimestamp(1_700_000_000_000)?.getTime()).toBe(1_700_000_000_000);
  });

  it('reads the listed non-ISO formats as UTC wall-clock times', () => {
    expect(parseTimestamp('March 5, 2024')?.getTime()).toBe(Date.UTC(2024, 2, 5));
    expect(parseTimestamp('03/05/2024 14:30')?.getTime()).toBe(Date.UTC(2024, 2, 5, 14, 30));
    expect(parseTimestamp('5 Mar 2024')?.getTime()).toBe(Date.UTC(2024, 2, 5));
    expect(parseTimestamp('2024-03-05T10:00:00')?.getTime()).toBe(Date.UTC(2024, 2, 5, 10));
  });

  it('honours an explicit offset', () => {
    expect(parseTimestamp('2024-03-05T10:00:00+02:00')?.getTime()).toBe(Date.UTC(2024, 2, 5, 8));
    expect(parseTimestamp('Tue, 05 Mar 2024 10:00:00 +0000')?.getTime()).toBe(
      Date.UTC(2024, 2, 5, 10),
    );
  });

  it('rejects text that only loosely resembles a date', () => {
    for (const text of ['week 3', 'Order 5', 'item 12', '5', 'soon']) {
      expect(parseTimestamp(text)).toBeNull();
    }
  });

  it('returns null for booleans, blanks and invalid dates', () => {
    expect(parseTimestamp(true)).toBeNull();
    expect(parseTimestamp('   ')).toBeNull();
    expect(parseTimestamp(new Date('nope'))).toBeNull();
  });
});

describe('isMissing', () => {
  it('treats null, NaN and invalid dates as missing', () => {
    expect(isMissing(null)).toBe(true);
    expect(isMissing(Number.NaN)).toBe(true);
    expect(isMissing(new Date('nope'))).toBe(true);
    expect(isMissing(0)).toBe(false);
    expect(isMissing('')).toBe(false);
  });
});

describe('isDateColumnName', () => {
  it('matches date-like names but not sentiment labels', () => {
    expect(isDateColumnName('created_at')).toBe(true);
    expect(isDateColumnName('review_timestamp')).toBe(true);
    expect(isDateColumnName('sentiment')).toBe(false);
  });
});
