import express, { Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { analyzeDataset } from './analysis/analyzer';
import { countSentiments } from './analysis/marketInsights';
import { isClassified } from './analysis/sentiment';
import { formatSummaryForLlm, summarizeDataset } from './analysis/summary';
import { AppConfig } from './config';
import { DatasetStore } from './dataset/datasetStore';
import { HttpError, sendError } from './errors';
import { chatWithData, generateInsights, GroqSettings, InsightStats } from './groq/groqClient';
import { streamReportPdf } from './pdf/reportPdf';

const UPSTREAM_FAILED = { status: 502, code: 'AI_FAILED' };

const ChatBodySchema = z.object({
  message: z.string().trim().min(1, 'message is required'),
});

const UploadQuerySchema = z.object({
  filename: z.string().trim().min(1, 'filename query parameter is required'),
});

export type AppDeps = {
  store: DatasetStore;
  config: Pick<AppConfig, 'MAX_UPLOAD_MB' | 'TOP_TOPICS' | 'GROQ_API_KEY' | 'GROQ_MODEL'>;
};

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues.map((i) => i.message).join('; ');
    throw new HttpError(400, 'INVALID_REQUEST', message);
  }
  return result.data;
}

export function createApp({ store, config }: AppDeps) {
  const app = express();
  const groq: GroqSettings = { apiKey: config.GROQ_API_KEY, model: config.GROQ_MODEL };

  app.use(cors());

  // Registered ahead of the JSON parser so uploaded .json files arrive as raw bytes.
  app.post(
    '/api/datasets',
    express.raw({ type: () => true, limit: `${config.MAX_UPLOAD_MB}mb` }),
    async (req: Request, res: Response) => {
      try {
        const { filename } = validate(UploadQuerySchema, req.query);
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
          throw new HttpError(400, 'EMPTY_UPLOAD', 'Upload body is empty.');
        }
        const dataset = await store.saveUpload(filename, req.body);
        return res.status(201).json({
          filename: dataset.fileName,
          rows: dataset.table.rows.length,
          columns: dataset.table.columns,
          classified: isClassified(dataset.table),
        });
      } catch (err) {
        return sendError(res, err);
      }
    },
  );

  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/datasets', async (_req, res: Response) => {
    try {
      const files = await store.listFiles();
      const current = store.getCurrent();
      return res.json({ files, current: current ? current.fileName : null });
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.post('/api/datasets/:filename/load', async (req: Request, res: Response) => {
    try {
      const dataset = await store.loadFile(req.params.filename);
      return res.json({
        filename: dataset.fileName,
        rows: dataset.table.rows.length,
        columns: dataset.table.columns,
        classified: isClassified(dataset.table),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.get('/api/dashboard', (_req, res: Response) => {
    try {
      const { fileName, table } = store.requireCurrent();
      return res.json({
        filename: fileName,
        summary: summarizeDataset(table, fileName),
        report: analyzeDataset(table, { topTopics: config.TOP_TOPICS }),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  app.get('/api/report/pdf', (_req, res: Response) => {
    try {
      const { fileName, table } = store.requireCurrent();
      const report = analyzeDataset(table, { topTopics: config.TOP_TOPICS });
      streamReportPdf(res, report, fileName);
    } catch (err) {
      sendError(res, err, { status: 500, code: 'PDF_FAILED' });
    }
  });

  app.post('/api/chat', async (req: Request, res: Response) => {
    try {
      const { message } = validate(ChatBodySchema, req.body);
      const { fileName, table } = store.requireCurrent();
      const summary = formatSummaryForLlm(summarizeDataset(table, fileName));
      const response = await chatWithData(groq, message, summary);
      return res.json({ response });
    } catch (err) {
      return sendError(res, err, UPSTREAM_FAILED);
    }
  });

  app.post('/api/insights', async (_req, res: Response) => {
    try {
      const { fileName, table } = store.requireCurrent();
      const stats: InsightStats = {
        rows: table.rows.length,
        cols: table.columns,
        sentiment_counts: isClassified(table) ? countSentiments(table) : 'No sentiment data',
      };
      const insights = await generateInsights(groq, fileName, stats);
      return res.json({ insights });
    } catch (err) {
      return sendError(res, err, UPSTREAM_FAILED);
    }
  });

  app.delete('/api/session', (_req, res) => {
    store.clear();
    res.json({ ok: true });
  });

  return app;
}
