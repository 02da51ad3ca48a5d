import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { DatasetError } from '../src/errors';
import { datasetFormat, decodeText, parseDataset, toCell } from '../src/dataset/loader';

describe('parseDataset (csv)', () => {
  it('parses quoted fields, numbers and empty cells', () => {
    const csv = 'Review,Likes,Date\n"Great, really",5,2024-03-01\nBad,,2024-03-02\n';
    const table = parseDataset('reviews.csv', Buffer.from(csv, 'utf-8'));

    expect(table.columns).toEqual(['Review', 'Likes', 'Date']);
    expect(table.rows).toEqual([
      ['Great, really', 5, '2024-03-01'],
      ['Bad', null, '2024-03-02'],
    ]);
  });

  it('pads short rows with missing cells', () => {
    const table = parseDataset('short.csv', Buffer.from('review,likes\nok\n'));
    expect(table.rows).toEqual([['ok', null]]);
  });

  it('ignores a byte-order mark in the header', () => {
    const table = parseDataset('bom.csv', Buffer.from('\uFEFFreview\nfine\n', 'utf-8'));
    expect(table.columns).toEqual(['review']);
  });
});

describe('decodeText', () => {
  it('falls back to latin1 when the bytes are not valid utf-8', () => {
    const buffer = Buffer.from('review\ncafé ok\n', 'latin1');
    expect(decodeText(buffer)).toBe('review\ncafé ok\n');
  });
});

describe('parseDataset (json)', () => {
  it('reads an array of records with the union of keys as columns', () => {
    const json = JSON.stringify([
      { review: 'ok', likes: 1 },
      { review: 'bad', date: '2024-01-01' },
    ]);
    const table = parseDataset('data.json', Buffer.from(json));

    expect(table.columns).toEqual(['review', 'likes', 'date']);
    expect(table.rows).toEqual([
      ['ok', 1, null],
      ['bad', null, '2024-01-01'],
    ]);
  });

  it('reads column-oriented objects', () => {
    const json = JSON.stringify({
      review: { 0: 'ok', 1: 'bad' },
      likes: { 0: 3, 1: 4 },
    });
    const table = parseDataset('split.json', Buffer.from(json));

    expect(table.columns).toEqual(['review', 'likes']);
    expect(table.rows).toEqual([
      ['ok', 3],
      ['bad', 4],
    ]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseDataset('broken.json', Buffer.from('{nope'))).toThrow(DatasetError);
  });
});

describe('parseDataset (spreadsheet)', () => {
  it('reads the first worksheet with its first row as header', () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Review', 'Likes'],
        ['ok', 2],
      ]),
      'Sheet1',
    );
    const buffer = Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const table = parseDataset('sheet.xlsx', buffer);
    expect(table.columns).toEqual(['Review', 'Likes']);
    expect(table.rows).toEqual([['ok', 2]]);
  });
});

describe('datasetFormat', () => {
  it('accepts known extensions case-insensitively', () => {
    expect(datasetFormat('Reviews.CSV')).toBe('csv');
    expect(datasetFormat('book.xlsx')).toBe('xlsx');
  });

  it('rejects anything else', () => {
    expect(datasetFormat('notes.txt')).toBeNull();
    expect(() => parseDataset('notes.txt', Buffer.from('x'))).toThrow(DatasetError);
  });
});

describe('toCell', () => {
  it('maps blanks to null and serializes nested values', () => {
    expect(toCell('  ')).toBeNull();
    expect(toCell(undefined)).toBeNull();
    expect(toCell(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toCell({ a: 1 })).toBe('{"a":1}');
  });
});
