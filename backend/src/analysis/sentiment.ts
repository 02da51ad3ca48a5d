import { SentimentIntensityAnalyzer } from 'vader-sentiment';
import { resolveLongestTextColumn, resolveTextColumn } from '../dataset/columnRoles';
import { logger } from '../logger';
import {
  CellValue,
  ClassifiedRecord,
  ClassifiedTable,
  RecordTable,
  SentimentLabel,
} from '../types';

export const POSITIVE_THRESHOLD = 0.05;
export const NEGATIVE_THRESHOLD = -0.05;

export type ScoredText = {
  sentiment: SentimentLabel;
  sentiment_score: number;
};

export function labelForScore(score: number): SentimentLabel {
  if (score >= POSITIVE_THRESHOLD) return 'Positive';
  if (score <= NEGATIVE_THRESHOLD) return 'Negative';
  return 'Neutral';
}

/** VADER compound score for one cell; anything that is not text scores 0. */
export function scoreText(value: CellValue | undefined): ScoredText {
  if (typeof value !== 'string') {
    return { sentiment: 'Neutral', sentiment_score: 0 };
  }
  const { compound } = SentimentIntensityAnalyzer.polarity_scores(value);
  const score = Number.isFinite(compound) ? Math.max(-1, Math.min(1, compound)) : 0;
  return { sentiment: labelForScore(score), sentiment_score: score };
}

export function isClassified(table: RecordTable | ClassifiedTable): table is ClassifiedTable {
  return 'textColumn' in table && typeof table.textColumn === 'string';
}

/**
 * Adds `sentiment` and `sentiment_score` to every row. The text column is the
 * first name synonym present, else the string column with the longest mean
 * length. Without one the input table is returned unchanged.
 */
export function classifySentiments(table: RecordTable): RecordTable | ClassifiedTable {
  const textColumn = resolveTextColumn(table.columns) ?? resolveLongestTextColumn(table);

  if (!textColumn) {
    logger.info('No suitable text column found. Skipping sentiment analysis.');
    return table;
  }

  logger.debug('Running sentiment analysis', { column: textColumn });

  const rows: ClassifiedRecord[] = table.rows.map((row) => ({
    ...row,
    ...scoreText(row[textColumn]),
  }));

  const columns = [...table.columns];
  for (const added of ['sentiment', 'sentiment_score']) {
    if (!columns.includes(added)) columns.push(added);
  }

  return { columns, rows, textColumn };
}
