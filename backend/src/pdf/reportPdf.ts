import PDFDocument from 'pdfkit';
import { Response } from 'express';
import { AnalysisReport } from '../types';

export function writeReportPdf(
  out: NodeJS.WritableStream,
  report: AnalysisReport,
  fileName?: string,
) {
  const doc = new PDFDocument({ margin: 50 });
  doc.pipe(out);

  const insights = report.market_insights;

  doc.fontSize(20).text('Sentiment Analysis Report', { align: 'center' });
  doc.moveDown(0.5);
  doc.fontSize(14).text(fileName || 'Uploaded dataset', { align: 'center' });
  doc.moveDown();

  doc.fontSize(12).text(`Generated at: ${new Date().toISOString()}`);
  doc.moveDown();

  // Overall verdict
  doc.fontSize(16).text('Market sentiment', { underline: true });
  doc.moveDown(0.5);
  doc
    .fontSize(12)
    .text(`Overall: ${insights.overall_sentiment} (score ${insights.sentiment_score})`)
    .text(`Confidence: ${insights.confidence}%`)
    .text(`Total mentions: ${insights.total_mentions}`)
    .text(`Engagement: ${insights.engagement_trend}`);
  doc.moveDown();

  // Sentiment breakdown
  doc.fontSize(16).text('Sentiment breakdown', { underline: true });
  doc.moveDown(0.5);
  doc.fontSize(12).text(`Positive: ${insights.positive_ratio}%`);
  doc.fontSize(12).text(`Negative: ${insights.negative_ratio}%`);
  doc.fontSize(12).text(`Neutral: ${insights.neutral_ratio}%`);
  doc.moveDown();

  if (insights.recommendations.length) {
    doc.fontSize(16).text('Recommendations', { underline: true });
    doc.moveDown(0.5);
    insights.recommendations.forEach((rec) => {
      doc.fontSize(12).text(`- ${rec}`);
    });
    doc.moveDown();
  }

  const topics = Object.entries(report.trending_topics);
  if (topics.length) {
    doc.fontSize(16).text('Trending topics', { underline: true });
    doc.moveDown(0.5);
    topics.forEach(([keyword, topic], idx) => {
      doc
        .fontSize(12)
        .text(
          `${idx + 1}. ${keyword}: ${topic.mentions} mentions, mostly ${topic.dominant_sentiment} ` +
            `(+${topic.positive_ratio}% / -${topic.negative_ratio}% / ${topic.neutral_ratio}% neutral)`,
        );
    });
    doc.moveDown();
  }

  if (report.emerging_issues.length) {
    doc.fontSize(16).text('Emerging issues', { underline: true });
    doc.moveDown(0.5);
    report.emerging_issues.forEach((issue, idx) => {
      doc
        .fontSize(13)
        .text(`${idx + 1}. ${issue.issue} (${issue.severity} severity)`, {
          continued: false,
        });
      doc.moveDown(0.25);
      doc
        .fontSize(12)
        .text(`${issue.mentions} negative mentions, ${issue.percentage}% of negative feedback`);
      doc.moveDown();
    });
  }

  if (report.sentiment_trends.length) {
    doc.fontSize(16).text('Sentiment over time', { underline: true });
    doc.moveDown(0.5);
    report.sentiment_trends.forEach((point) => {
      doc
        .fontSize(12)
        .text(
          `${point.date_str}: ${point.Positive} positive, ${point.Negative} negative, ${point.Neutral} neutral`,
        );
    });
  }

  doc.end();
}

export function streamReportPdf(res: Response, report: AnalysisReport, fileName?: string) {
  res.setHeader('Content-Type', 'application/pdf');
  res.setHeader('Content-Disposition', `attachment; filename="sentiment-report.pdf"`);
  writeReportPdf(res, report, fileName);
}
