import { resolveTimeColumn } from '../dataset/columnRoles';
import { parseTimestamp } from '../dataset/normalizer';
import { logger, errorMessage } from '../logger';
import { ClassifiedTable, SentimentLabel, TrendPoint } from '../types';

export type BucketGranularity = 'daily' | 'weekly' | 'monthly';

type GranularityRule = {
  granularity: BucketGranularity;
  matches: (spanDays: number) => boolean;
};

// Evaluated in order; the last rule always matches.
export const GRANULARITY_RULES: readonly GranularityRule[] = [
  { granularity: 'daily', matches: (days) => days < 60 },
  { granularity: 'weekly', matches: (days) => days < 365 },
  { granularity: 'monthly', matches: () => true },
];

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Whole days between the first and last timestamp, rounded down. */
export function spanInDays(first: Date, last: Date): number {
  return Math.floor((last.getTime() - first.getTime()) / MS_PER_DAY);
}

export function chooseGranularity(spanDays: number): BucketGranularity {
  const rule = GRANULARITY_RULES.find((r) => r.matches(spanDays));
  return rule ? rule.granularity : 'monthly';
}

/**
 * Bucket label for a timestamp, computed in UTC. Weekly buckets run Monday to
 * Sunday and are labelled by their closing Sunday; monthly buckets by the
 * month's last day.
 */
export function bucketDate(date: Date, granularity: BucketGranularity): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  const day = date.getUTCDate();
  switch (granularity) {
    case 'daily':
      return new Date(Date.UTC(year, month, day));
    case 'weekly':
      // getUTCDay() is 0 on Sunday
      return new Date(Date.UTC(year, month, day + ((7 - date.getUTCDay()) % 7)));
    case 'monthly':
      return new Date(Date.UTC(year, month + 1, 0));
  }
}

export function formatBucket(bucket: Date): string {
  return bucket.toISOString().slice(0, 10);
}

type Stamped = {
  at: Date;
  sentiment: SentimentLabel;
};

function aggregate(table: ClassifiedTable, timeColumn: string): TrendPoint[] {
  const stamped: Stamped[] = [];
  for (const row of table.rows) {
    const at = parseTimestamp(row[timeColumn]);
    if (at) stamped.push({ at, sentiment: row.sentiment });
  }
  if (!stamped.length) return [];

  let first = stamped[0].at;
  let last = stamped[0].at;
  for (const { at } of stamped) {
    if (at < first) first = at;
    if (at > last) last = at;
  }
  const granularity = chooseGranularity(spanInDays(first, last));

  const buckets = new Map<number, TrendPoint>();
  for (const { at, sentiment } of stamped) {
    const bucket = bucketDate(at, granularity);
    const key = bucket.getTime();
    let point = buckets.get(key);
    if (!point) {
      point = { date_str: formatBucket(bucket), Positive: 0, Negative: 0, Neutral: 0 };
      buckets.set(key, point);
    }
    point[sentiment] += 1;
  }

  return [...buckets.entries()].sort(([a], [b]) => a - b).map(([, point]) => point);
}

/**
 * Sentiment counts per time bucket, ascending, with every label zero-filled.
 * Returns an empty series when there is no usable time column.
 */
export function getSentimentTrends(table: ClassifiedTable): TrendPoint[] {
  const timeColumn = resolveTimeColumn(table.columns);
  if (!timeColumn) return [];

  logger.debug('Aggregating sentiment trends', { column: timeColumn });
  try {
    return aggregate(table, timeColumn);
  } catch (err) {
    logger.warn('Sentiment trends not computed', { error: errorMessage(err) });
    return [];
  }
}
