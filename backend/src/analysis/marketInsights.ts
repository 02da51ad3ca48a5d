import { resolveEngagementColumn, resolveTimeColumn } from '../dataset/columnRoles';
import { parseTimestamp } from '../dataset/normalizer';
import { logger, errorMessage } from '../logger';
import {
  ClassifiedTable,
  MarketInsights,
  OverallSentiment,
  RecordTable,
  SentimentCounts,
  SentimentLabel,
} from '../types';
import { mean, numericValue, percent, roundTo } from './numbers';
import { isClassified } from './sentiment';

export const NO_SENTIMENT_RECOMMENDATION = 'No sentiment data available';

type VerdictRule = {
  verdict: OverallSentiment;
  matches: (score: number) => boolean;
  confidence: (score: number) => number;
};

// First matching rule decides the verdict.
export const VERDICT_RULES: readonly VerdictRule[] = [
  {
    verdict: 'Very Positive',
    matches: (s) => s > 0.2,
    confidence: (s) => Math.min(95, 70 + s * 50),
  },
  { verdict: 'Positive', matches: (s) => s > 0.05, confidence: () => 65 },
  {
    verdict: 'Very Negative',
    matches: (s) => s < -0.2,
    confidence: (s) => Math.min(95, 70 + Math.abs(s) * 50),
  },
  { verdict: 'Negative', matches: (s) => s < -0.05, confidence: () => 65 },
  { verdict: 'Neutral', matches: () => true, confidence: () => 55 },
];

export type SentimentRatios = {
  positive_ratio: number;
  negative_ratio: number;
  neutral_ratio: number;
};

type RecommendationRule = {
  matches: (ratios: SentimentRatios) => boolean;
  messages: string[];
};

// Only the first matching rule contributes messages.
export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    matches: (r) => r.positive_ratio > 60,
    messages: [
      'Strong positive sentiment - maintain current strategy',
      'Consider amplifying positive messaging',
    ],
  },
  {
    matches: (r) => r.negative_ratio > 40,
    messages: [
      'High negative sentiment detected',
      'Immediate action recommended - investigate root causes',
      'Increase customer engagement and support',
    ],
  },
  {
    matches: (r) => r.neutral_ratio > 50,
    messages: [
      'High neutral sentiment - opportunity to create stronger emotional connection',
      'Focus on creating more engaging content',
    ],
  },
];

export const ENGAGEMENT_STABLE = 'Stable';
export const ENGAGEMENT_POSITIVE = 'Positive content drives higher engagement';
export const ENGAGEMENT_NEGATIVE = 'Negative content drives higher engagement';
export const ENGAGEMENT_BALANCED = 'Balanced engagement across sentiments';

export const IMPROVING_NOTE = 'Sentiment is improving over time';
export const DECLINING_NOTE = 'Sentiment is declining - requires attention';

// Minimum change in the Positive fraction between halves that counts as a trend.
const TREND_DELTA = 0.1;

export type TrendDirection = 'improving' | 'declining' | 'stable';

export type TemporalTrend =
  | { status: 'not_computed'; reason: string }
  | {
      status: 'computed';
      firstHalfPositive: number;
      secondHalfPositive: number;
      direction: TrendDirection;
    };

export function neutralInsights(totalMentions: number): MarketInsights {
  return {
    overall_sentiment: 'Neutral',
    sentiment_score: 0,
    confidence: 0,
    positive_ratio: 0,
    negative_ratio: 0,
    neutral_ratio: 0,
    total_mentions: totalMentions,
    engagement_trend: ENGAGEMENT_STABLE,
    recommendations: [],
  };
}

export function countSentiments(table: ClassifiedTable): SentimentCounts {
  const counts: SentimentCounts = { Positive: 0, Negative: 0, Neutral: 0 };
  for (const row of table.rows) {
    counts[row.sentiment] += 1;
  }
  return counts;
}

export function verdictFor(score: number): { verdict: OverallSentiment; confidence: number } {
  const rule = VERDICT_RULES.find((r) => r.matches(score)) ?? VERDICT_RULES[VERDICT_RULES.length - 1];
  return { verdict: rule.verdict, confidence: roundTo(rule.confidence(score), 1) };
}

export function buildRecommendations(ratios: SentimentRatios): string[] {
  const rule = RECOMMENDATION_RULES.find((r) => r.matches(ratios));
  return rule ? [...rule.messages] : [];
}

function labelMean(table: ClassifiedTable, column: string, label: SentimentLabel): number {
  const values = table.rows
    .filter((row) => row.sentiment === label)
    .map((row) => numericValue(row[column]))
    .filter((v): v is number => v !== null);
  return mean(values) ?? 0;
}

export function engagementTrend(table: ClassifiedTable): string {
  const column = resolveEngagementColumn(table.columns);
  if (!column) return ENGAGEMENT_STABLE;

  const positive = labelMean(table, column, 'Positive');
  const negative = labelMean(table, column, 'Negative');

  if (positive > negative * 1.5) return ENGAGEMENT_POSITIVE;
  if (negative > positive * 1.5) return ENGAGEMENT_NEGATIVE;
  return ENGAGEMENT_BALANCED;
}

function positiveFraction(labels: SentimentLabel[]): number {
  return labels.filter((l) => l === 'Positive').length / labels.length;
}

/**
 * Compares the Positive share of the earlier and later half of the rows,
 * ordered by time. Rows without a usable timestamp are left out.
 */
export function computeTemporalTrend(table: ClassifiedTable): TemporalTrend {
  const timeColumn = resolveTimeColumn(table.columns);
  if (!timeColumn) return { status: 'not_computed', reason: 'no time column' };

  try {
    const ordered = table.rows
      .map((row) => ({ at: parseTimestamp(row[timeColumn]), sentiment: row.sentiment }))
      .filter((r): r is { at: Date; sentiment: SentimentLabel } => r.at !== null)
      .sort((a, b) => a.at.getTime() - b.at.getTime());

    const midpoint = Math.floor(ordered.length / 2);
    const firstHalf = ordered.slice(0, midpoint).map((r) => r.sentiment);
    const secondHalf = ordered.slice(midpoint).map((r) => r.sentiment);
    if (!firstHalf.length || !secondHalf.length) {
      return { status: 'not_computed', reason: 'not enough timestamped rows' };
    }

    const firstHalfPositive = positiveFraction(firstHalf);
    const secondHalfPositive = positiveFraction(secondHalf);
    let direction: TrendDirection = 'stable';
    if (secondHalfPositive > firstHalfPositive + TREND_DELTA) direction = 'improving';
    else if (secondHalfPositive < firstHalfPositive - TREND_DELTA) direction = 'declining';

    return { status: 'computed', firstHalfPositive, secondHalfPositive, direction };
  } catch (err) {
    logger.warn('Temporal sentiment trend not computed', { error: errorMessage(err) });
    return { status: 'not_computed', reason: errorMessage(err) };
  }
}

function trendNote(trend: TemporalTrend): string | null {
  if (trend.status !== 'computed') return null;
  if (trend.direction === 'improving') return IMPROVING_NOTE;
  if (trend.direction === 'declining') return DECLINING_NOTE;
  return null;
}

/**
 * Reduces per-row sentiment to one verdict with confidence, engagement
 * comparison and recommendations. Tables without sentiment get a neutral
 * report instead of an error.
 */
export function analyzeMarketSentiment(table: RecordTable | ClassifiedTable): MarketInsights {
  if (!isClassified(table)) {
    const insights = neutralInsights(table.rows.length);
    insights.recommendations.push(NO_SENTIMENT_RECOMMENDATION);
    return insights;
  }

  const total = table.rows.length;
  if (total === 0) return neutralInsights(0);

  const counts = countSentiments(table);
  const ratios: SentimentRatios = {
    positive_ratio: percent(counts.Positive, total),
    negative_ratio: percent(counts.Negative, total),
    neutral_ratio: percent(counts.Neutral, total),
  };

  const score = (counts.Positive - counts.Negative) / total;
  const { verdict, confidence } = verdictFor(score);

  const recommendations = buildRecommendations(ratios);
  const note = trendNote(computeTemporalTrend(table));
  if (note) recommendations.push(note);

  return {
    overall_sentiment: verdict,
    sentiment_score: roundTo(score, 3),
    confidence,
    ...ratios,
    total_mentions: total,
    engagement_trend: engagementTrend(table),
    recommendations,
  };
}
