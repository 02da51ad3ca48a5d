import { ClassifiedRecord, ClassifiedTable, DataRecord, SentimentLabel } from '../src/types';

type Row = DataRecord & { sentiment: SentimentLabel };

/** Builds a classified table with hand-picked labels, skipping the lexicon. */
export function classifiedTable(rows: Row[], textColumn = 'review'): ClassifiedTable {
  const columns: string[] = [textColumn];
  const records: ClassifiedRecord[] = rows.map((row) => {
    const record: ClassifiedRecord = {
      ...row,
      sentiment_score: typeof row.sentiment_score === 'number' ? row.sentiment_score : 0,
    };
    for (const key of Object.keys(record)) {
      if (!columns.includes(key)) columns.push(key);
    }
    return record;
  });
  return { columns, rows: records, textColumn };
}

export function repeat<T>(count: number, make: (idx: number) => T): T[] {
  return Array.from({ length: count }, (_, idx) => make(idx));
}
