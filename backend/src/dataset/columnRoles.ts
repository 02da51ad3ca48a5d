import { mean, textValue } from '../analysis/numbers';
import { RecordTable } from '../types';

export type ColumnRole = 'text' | 'time' | 'engagement';

// Ordered by priority: the first synonym present in the table wins.
export const TEXT_COLUMN_SYNONYMS = [
  'feedback',
  'review',
  'comment',
  'content',
  'text',
  'body',
] as const;

export const TIME_COLUMN_MARKERS = ['date', 'time', 'created'] as const;

// Written by the classifier; "sentiment" would otherwise match the "time" marker.
export const SENTIMENT_COLUMNS = ['sentiment', 'sentiment_score'] as const;

export function isSentimentColumn(name: string): boolean {
  const lower = name.toLowerCase();
  return SENTIMENT_COLUMNS.some((col) => col === lower);
}

export const ENGAGEMENT_COLUMN_SYNONYMS = [
  'likes',
  'like_count',
  'likecount',
  'upvotes',
  'votes',
  'engagement',
] as const;

export type ColumnRoles = {
  text: string | null;
  time: string | null;
  engagement: string | null;
};

export function resolveTextColumn(columns: string[]): string | null {
  for (const synonym of TEXT_COLUMN_SYNONYMS) {
    const match = columns.find((col) => col.toLowerCase() === synonym);
    if (match) return match;
  }
  return null;
}

export function resolveTimeColumn(columns: string[]): string | null {
  return (
    columns.find((col) => {
      const name = col.toLowerCase();
      if (isSentimentColumn(name)) return false;
      return TIME_COLUMN_MARKERS.some((marker) => name.includes(marker));
    }) ?? null
  );
}

export function resolveEngagementColumn(columns: string[]): string | null {
  for (const synonym of ENGAGEMENT_COLUMN_SYNONYMS) {
    const match = columns.find((col) => col.toLowerCase() === synonym);
    if (match) return match;
  }
  return null;
}

/**
 * Fallback used by the sentiment classifier only: the column with the
 * greatest mean text length. A column qualifies when at least one cell is a
 * string; its other non-null cells (numbers or dates the loader typed) are
 * measured by their text form. A tie keeps the column that comes first.
 */
export function resolveLongestTextColumn(table: RecordTable): string | null {
  let best: string | null = null;
  let bestMean = -1;

  for (const col of table.columns) {
    const values = table.rows.map((row) => row[col]).filter((v) => v !== null && v !== undefined);
    if (!values.some((v) => typeof v === 'string')) continue;

    const lengths = values
      .map((v) => textValue(v))
      .filter((text): text is string => text !== null)
      .map((text) => text.length);
    const avg = mean(lengths);
    if (avg !== null && avg > bestMean) {
      best = col;
      bestMean = avg;
    }
  }

  return best;
}

export function resolveColumnRoles(columns: string[]): ColumnRoles {
  return {
    text: resolveTextColumn(columns),
    time: resolveTimeColumn(columns),
    engagement: resolveEngagementColumn(columns),
  };
}
