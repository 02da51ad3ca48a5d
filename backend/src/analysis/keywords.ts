import { RegexpTokenizer } from 'natural';
import stopwordList from '../../data/stopwords-en.json';
import { resolveTextColumn } from '../dataset/columnRoles';
import { logger, errorMessage } from '../logger';
import {
  KeywordCount,
  RecordTable,
  SENTIMENT_LABELS,
  SentimentLabel,
  TopicEntry,
  TrendingTopics,
} from '../types';
import { percent, textValue } from './numbers';

export const DEFAULT_TOP_TOPICS = 10;
export const COMMON_KEYWORD_LIMIT = 20;

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);
const LOWER_ALPHA = /^[a-z]+$/;

// Splits on anything but letters, digits, apostrophes and hyphens, so accented
// and hyphenated words stay whole and are then dropped by LOWER_ALPHA.
const tokenizer = new RegexpTokenizer({ pattern: /[^\p{L}\p{N}_'-]+/u });

export function tokenize(text: string): string[] {
  return tokenizer.tokenize(text.toLowerCase()) ?? [];
}

/** Alphabetic, non-stopword tokens longer than `minLength`. */
export function keywordTokens(text: string, minLength: number): string[] {
  return tokenize(text).filter(
    (token) => LOWER_ALPHA.test(token) && token.length > minLength && !STOPWORDS.has(token),
  );
}

function rowLabel(value: unknown): SentimentLabel {
  return SENTIMENT_LABELS.find((label) => label === value) ?? 'Neutral';
}

type TopicCounts = {
  count: number;
} & Record<SentimentLabel, number>;

// Highest sub-count wins; ties go to the earlier label in SENTIMENT_LABELS.
function dominantSentiment(counts: TopicCounts): SentimentLabel {
  let best: SentimentLabel = SENTIMENT_LABELS[0];
  for (const label of SENTIMENT_LABELS) {
    if (counts[label] > counts[best]) best = label;
  }
  return best;
}

/**
 * Ranks keywords by mentions (first-seen order breaks ties) and attaches the
 * sentiment split of the rows each keyword occurred in.
 */
export function getTrendingTopics(
  table: RecordTable,
  topN: number = DEFAULT_TOP_TOPICS,
): TrendingTopics {
  const textColumn = resolveTextColumn(table.columns);
  if (!textColumn) return {};

  const topics = new Map<string, TopicCounts>();

  for (const row of table.rows) {
    const text = textValue(row[textColumn]);
    if (text === null) continue;

    try {
      const sentiment = rowLabel(row.sentiment);
      for (const keyword of keywordTokens(text, 3)) {
        let counts = topics.get(keyword);
        if (!counts) {
          counts = { count: 0, Positive: 0, Negative: 0, Neutral: 0 };
          topics.set(keyword, counts);
        }
        counts.count += 1;
        counts[sentiment] += 1;
      }
    } catch (err) {
      logger.debug('Skipping row during topic extraction', { error: errorMessage(err) });
    }
  }

  const ranked = [...topics.entries()]
    .sort(([, a], [, b]) => b.count - a.count)
    .slice(0, Math.max(0, topN));

  const result: TrendingTopics = {};
  for (const [keyword, counts] of ranked) {
    const entry: TopicEntry = {
      mentions: counts.count,
      positive_ratio: percent(counts.Positive, counts.count),
      negative_ratio: percent(counts.Negative, counts.count),
      neutral_ratio: percent(counts.Neutral, counts.count),
      dominant_sentiment: dominantSentiment(counts),
    };
    result[keyword] = entry;
  }
  return result;
}

/** Most frequent words across all text, without sentiment attribution. */
export function extractCommonKeywords(
  table: RecordTable,
  limit: number = COMMON_KEYWORD_LIMIT,
): KeywordCount[] {
  const textColumn = resolveTextColumn(table.columns);
  if (!textColumn) return [];

  const allText = table.rows
    .map((row) => textValue(row[textColumn]))
    .filter((text): text is string => text !== null)
    .join(' ');

  const counts = new Map<string, number>();
  for (const keyword of keywordTokens(allText, 2)) {
    counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([, a], [, b]) => b - a)
    .slice(0, limit)
    .map(([keyword, count]) => ({ keyword, count }));
}
