import { describe, it, expect } from 'vitest';
import {
  analyzeMarketSentiment,
  buildRecommendations,
  computeTemporalTrend,
  DECLINING_NOTE,
  engagementTrend,
  ENGAGEMENT_BALANCED,
  ENGAGEMENT_NEGATIVE,
  ENGAGEMENT_POSITIVE,
  ENGAGEMENT_STABLE,
  IMPROVING_NOTE,
  NO_SENTIMENT_RECOMMENDATION,
  verdictFor,
} from '../src/analysis/marketInsights';
import { SENTIMENT_LABELS, SentimentLabel } from '../src/types';
import { classifiedTable, repeat } from './helpers';

function labelled(counts: Record<SentimentLabel, number>) {
  const rows = SENTIMENT_LABELS.flatMap((sentiment) =>
    repeat(counts[sentiment], (idx) => ({ review: `${sentiment} ${idx}`, sentiment })),
  );
  return classifiedTable(rows);
}

describe('verdictFor', () => {
  it('maps scores onto verdicts with strict thresholds', () => {
    expect(verdictFor(0.4)).toEqual({ verdict: 'Very Positive', confidence: 90 });
    expect(verdictFor(0.2)).toEqual({ verdict: 'Positive', confidence: 65 });
    expect(verdictFor(0.1)).toEqual({ verdict: 'Positive', confidence: 65 });
    expect(verdictFor(0.05)).toEqual({ verdict: 'Neutral', confidence: 55 });
    expect(verdictFor(-0.05)).toEqual({ verdict: 'Neutral', confidence: 55 });
    expect(verdictFor(-0.1)).toEqual({ verdict: 'Negative', confidence: 65 });
    expect(verdictFor(-0.3)).toEqual({ verdict: 'Very Negative', confidence: 85 });
  });

  it('caps confidence at 95', () => {
    expect(verdictFor(-0.5).confidence).toBe(95);
    expect(verdictFor(1).confidence).toBe(95);
  });
});

describe('buildRecommendations', () => {
  it('needs a positive share above 60', () => {
    expect(buildRecommendations({ positive_ratio: 60, negative_ratio: 20, neutral_ratio: 20 })).toEqual([]);
    expect(
      buildRecommendations({ positive_ratio: 60.1, negative_ratio: 19.9, neutral_ratio: 20 }),
    ).toEqual([
      'Strong positive sentiment - maintain current strategy',
      'Consider amplifying positive messaging',
    ]);
  });

  it('uses only the first matching rule', () => {
    expect(buildRecommendations({ positive_ratio: 0, negative_ratio: 45, neutral_ratio: 55 })).toEqual([
      'High negative sentiment detected',
      'Immediate action recommended - investigate root causes',
      'Increase customer engagement and support',
    ]);
    expect(buildRecommendations({ positive_ratio: 10, negative_ratio: 30, neutral_ratio: 60 })).toEqual([
      'High neutral sentiment - opportunity to create stronger emotional connection',
      'Focus on creating more engaging content',
    ]);
  });
});

describe('engagementTrend', () => {
  it('is Stable without an engagement column', () => {
    expect(engagementTrend(classifiedTable([{ review: 'x', sentiment: 'Positive' }]))).toBe(
      ENGAGEMENT_STABLE,
    );
  });

  it('compares mean engagement of positive and negative rows', () => {
    const positiveLed = classifiedTable([
      { review: 'a', likes: 10, sentiment: 'Positive' },
      { review: 'b', likes: 20, sentiment: 'Positive' },
      { review: 'c', likes: 4, sentiment: 'Negative' },
    ]);
    expect(engagementTrend(positiveLed)).toBe(ENGAGEMENT_POSITIVE);

    const negativeLed = classifiedTable([
      { review: 'a', upvotes: 10, sentiment: 'Positive' },
      { review: 'b', upvotes: 30, sentiment: 'Negative' },
    ]);
    expect(engagementTrend(negativeLed)).toBe(ENGAGEMENT_NEGATIVE);

    const balanced = classifiedTable([
      { review: 'a', likes: 10, sentiment: 'Positive' },
      { review: 'b', likes: 12, sentiment: 'Negative' },
    ]);
    expect(engagementTrend(balanced)).toBe(ENGAGEMENT_BALANCED);
  });
});

describe('computeTemporalTrend', () => {
  it('reports not_computed without a time column', () => {
    const trend = computeTemporalTrend(classifiedTable([{ review: 'a', sentiment: 'Positive' }]));
    expect(trend.status).toBe('not_computed');
  });

  it('orders rows by time before splitting them in halves', () => {
    const table = classifiedTable([
      { review: 'a', date: '2024-01-04', sentiment: 'Positive' },
      { review: 'b', date: '2024-01-01', sentiment: 'Negative' },
      { review: 'c', date: '2024-01-03', sentiment: 'Positive' },
      { review: 'd', date: '2024-01-02', sentiment: 'Negative' },
    ]);

    expect(computeTemporalTrend(table)).toEqual({
      status: 'computed',
      firstHalfPositive: 0,
      secondHalfPositive: 1,
      direction: 'improving',
    });
  });
});

describe('analyzeMarketSentiment', () => {
  it('summarizes a 6/2/2 split', () => {
    const insights = analyzeMarketSentiment(labelled({ Positive: 6, Negative: 2, Neutral: 2 }));

    expect(insights).toEqual({
      overall_sentiment: 'Very Positive',
      sentiment_score: 0.4,
      confidence: 90,
      positive_ratio: 60,
      negative_ratio: 20,
      neutral_ratio: 20,
      total_mentions: 10,
      engagement_trend: ENGAGEMENT_STABLE,
      recommendations: [],
    });
  });

  it('keeps ratios summing to 100 within rounding', () => {
    const insights = analyzeMarketSentiment(labelled({ Positive: 1, Negative: 1, Neutral: 1 }));
    const sum = insights.positive_ratio + insights.negative_ratio + insights.neutral_ratio;
    expect(Math.abs(sum - 100)).toBeLessThanOrEqual(0.1 + 1e-9);
  });

  it('appends the improving note after the rule messages', () => {
    const table = classifiedTable([
      { review: 'a', date: '2024-01-01', sentiment: 'Negative' },
      { review: 'b', date: '2024-01-02', sentiment: 'Negative' },
      { review: 'c', date: '2024-01-03', sentiment: 'Positive' },
      { review: 'd', date: '2024-01-04', sentiment: 'Positive' },
    ]);

    const insights = analyzeMarketSentiment(table);
    expect(insights.overall_sentiment).toBe('Neutral');
    expect(insights.recommendations).toEqual([
      'High negative sentiment detected',
      'Immediate action recommended - investigate root causes',
      'Increase customer engagement and support',
      IMPROVING_NOTE,
    ]);
  });

  it('appends the declining note when positives fade', () => {
    const table = classifiedTable([
      { review: 'a', date: '2024-01-01', sentiment: 'Positive' },
      { review: 'b', date: '2024-01-02', sentiment: 'Positive' },
      { review: 'c', date: '2024-01-03', sentiment: 'Neutral' },
      { review: 'd', date: '2024-01-04', sentiment: 'Neutral' },
    ]);

    expect(analyzeMarketSentiment(table).recommendations).toEqual([DECLINING_NOTE]);
  });

  it('returns a neutral report for tables without sentiment', () => {
    const insights = analyzeMarketSentiment({ columns: ['id'], rows: [{ id: 1 }, { id: 2 }] });

    expect(insights.overall_sentiment).toBe('Neutral');
    expect(insights.confidence).toBe(0);
    expect(insights.total_mentions).toBe(2);
    expect(insights.recommendations).toEqual([NO_SENTIMENT_RECOMMENDATION]);
  });
});
