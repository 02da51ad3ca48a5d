import { resolveTextColumn } from '../dataset/columnRoles';
import { ClassifiedTable, IssueEntry, RecordTable, Severity } from '../types';
import { percent, textValue } from './numbers';
import { isClassified } from './sentiment';

export const MAX_ISSUES = 5;

export const ISSUE_CATEGORIES: ReadonlyArray<{ issue: string; keywords: string[] }> = [
  { issue: 'Quality', keywords: ['quality', 'broken', 'defect', 'faulty', 'poor'] },
  {
    issue: 'Service',
    keywords: ['service', 'support', 'customer service', 'help', 'response'],
  },
  { issue: 'Price', keywords: ['price', 'expensive', 'cost', 'overpriced', 'refund'] },
  {
    issue: 'Delivery',
    keywords: ['delivery', 'shipping', 'late', 'delayed', 'never arrived'],
  },
  {
    issue: 'Performance',
    keywords: ['slow', 'lag', 'crash', 'bug', 'error', 'not working'],
  },
];

type SeverityRule = {
  severity: Severity;
  // share of negative rows mentioning the category
  matches: (share: number) => boolean;
};

export const SEVERITY_RULES: readonly SeverityRule[] = [
  { severity: 'High', matches: (share) => share > 0.3 },
  { severity: 'Medium', matches: (share) => share > 0.1 },
  { severity: 'Low', matches: () => true },
];

export function severityFor(mentions: number, negativeRows: number): Severity {
  const share = mentions / negativeRows;
  const rule = SEVERITY_RULES.find((r) => r.matches(share));
  return rule ? rule.severity : 'Low';
}

/**
 * Counts negative rows mentioning each problem category and ranks the
 * categories by mentions. Categories nobody mentioned are left out.
 */
export function detectEmergingIssues(table: RecordTable | ClassifiedTable): IssueEntry[] {
  if (!isClassified(table)) return [];

  const textColumn = resolveTextColumn(table.columns);
  if (!textColumn) return [];

  const negatives = table.rows.filter((row) => row.sentiment === 'Negative');
  if (!negatives.length) return [];

  const texts = negatives
    .map((row) => textValue(row[textColumn]))
    .filter((text): text is string => text !== null)
    .map((text) => text.toLowerCase());

  const issues: IssueEntry[] = [];
  for (const { issue, keywords } of ISSUE_CATEGORIES) {
    const mentions = texts.filter((text) => keywords.some((k) => text.includes(k))).length;
    if (mentions === 0) continue;

    issues.push({
      issue,
      mentions,
      severity: severityFor(mentions, negatives.length),
      percentage: percent(mentions, negatives.length),
    });
  }

  return issues.sort((a, b) => b.mentions - a.mentions).slice(0, MAX_ISSUES);
}
