export type CellValue = string | number | boolean | Date | null;

export type DataRecord = Record<string, CellValue>;

// Header row plus positional cells, as produced by the file loader.
export type RawTable = {
  columns: string[];
  rows: CellValue[][];
};

export type RecordTable = {
  columns: string[];
  rows: DataRecord[];
};

export type SentimentLabel = 'Positive' | 'Neutral' | 'Negative';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = [
  'Positive',
  'Negative',
  'Neutral',
];

export type ClassifiedRecord = DataRecord & {
  sentiment: SentimentLabel;
  sentiment_score: number;
};

export type ClassifiedTable = {
  columns: string[];
  rows: ClassifiedRecord[];
  textColumn: string;
};

export type SentimentCounts = {
  Positive: number;
  Negative: number;
  Neutral: number;
};

export type TrendPoint = SentimentCounts & {
  date_str: string;
};

export type TopicEntry = {
  mentions: number;
  positive_ratio: number;
  negative_ratio: number;
  neutral_ratio: number;
  dominant_sentiment: SentimentLabel;
};

export type TrendingTopics = Record<string, TopicEntry>;

export type KeywordCount = {
  keyword: string;
  count: number;
};

export type OverallSentiment =
  | 'Very Positive'
  | 'Positive'
  | 'Neutral'
  | 'Negative'
  | 'Very Negative';

export type MarketInsights = {
  overall_sentiment: OverallSentiment;
  sentiment_score: number;
  confidence: number;
  positive_ratio: number;
  negative_ratio: number;
  neutral_ratio: number;
  total_mentions: number;
  engagement_trend: string;
  recommendations: string[];
};

export type Severity = 'High' | 'Medium' | 'Low';

export type IssueEntry = {
  issue: string;
  mentions: number;
  severity: Severity;
  percentage: number;
};

export type AnalysisReport = {
  market_insights: MarketInsights;
  trending_topics: TrendingTopics;
  sentiment_trends: TrendPoint[];
  emerging_issues: IssueEntry[];
  common_keywords: KeywordCount[];
};
