import { parseDataset } from '../dataset/loader';
import { normalizeTable } from '../dataset/normalizer';
import { DatasetError } from '../errors';
import { logger, errorMessage } from '../logger';
import {
  AnalysisReport,
  ClassifiedTable,
  IssueEntry,
  KeywordCount,
  MarketInsights,
  RecordTable,
  TrendingTopics,
  TrendPoint,
} from '../types';
import { detectEmergingIssues } from './issues';
import { DEFAULT_TOP_TOPICS, extractCommonKeywords, getTrendingTopics } from './keywords';
import { analyzeMarketSentiment, neutralInsights } from './marketInsights';
import { classifySentiments, isClassified } from './sentiment';
import { getSentimentTrends } from './trends';

export type LoadedDataset = {
  fileName: string;
  table: RecordTable | ClassifiedTable;
};

export type AnalyzeOptions = {
  topTopics?: number;
};

/** Parses, normalizes and classifies an uploaded file. */
export function prepareDataset(fileName: string, buffer: Buffer): LoadedDataset {
  const table = normalizeTable(parseDataset(fileName, buffer));
  if (!table.rows.length || !table.columns.length) {
    throw new DatasetError(`"${fileName}" contains no data.`);
  }

  logger.info('Dataset loaded', {
    file: fileName,
    rows: table.rows.length,
    columns: table.columns.length,
  });

  return { fileName, table: classifySentiments(table) };
}

function runStage<T>(name: string, fallback: T, stage: () => T): T {
  try {
    return stage();
  } catch (err) {
    logger.error(`Analysis stage "${name}" failed`, { error: errorMessage(err) });
    return fallback;
  }
}

/**
 * Runs every report stage over the classified table. Stages only read the
 * table, so one failing leaves the others intact.
 */
export function analyzeDataset(
  table: RecordTable | ClassifiedTable,
  options: AnalyzeOptions = {},
): AnalysisReport {
  const topTopics = options.topTopics ?? DEFAULT_TOP_TOPICS;

  const insightsFallback = neutralInsights(table.rows.length);

  return {
    market_insights: runStage<MarketInsights>('market insights', insightsFallback, () =>
      analyzeMarketSentiment(table),
    ),
    trending_topics: runStage<TrendingTopics>('trending topics', {}, () =>
      getTrendingTopics(table, topTopics),
    ),
    sentiment_trends: runStage<TrendPoint[]>('sentiment trends', [], () =>
      isClassified(table) ? getSentimentTrends(table) : [],
    ),
    emerging_issues: runStage<IssueEntry[]>('emerging issues', [], () =>
      detectEmergingIssues(table),
    ),
    common_keywords: runStage<KeywordCount[]>('common keywords', [], () =>
      extractCommonKeywords(table),
    ),
  };
}
