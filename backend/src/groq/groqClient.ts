import fetch from 'node-fetch';
import { z } from 'zod';
import { SentimentCounts } from '../types';

const GROQ_API_URL = 'https://api.groq.com/openai/v1/chat/completions';

export type GroqSettings = {
  apiKey?: string;
  model: string;
};

type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .default([]),
});

function requireApiKey(settings: GroqSettings): string {
  if (!settings.apiKey) {
    throw new Error('GROQ_API_KEY is not set. Add it to the environment or .env file.');
  }
  return settings.apiKey;
}

async function createChatCompletion(
  settings: GroqSettings,
  messages: ChatMessage[],
): Promise<string> {
  const apiKey = requireApiKey(settings);

  const res = await fetch(GROQ_API_URL, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      model: settings.model,
      messages,
      temperature: 0,
    }),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Groq API error: ${res.status} ${text}`);
  }

  const parsed = CompletionSchema.safeParse(await res.json());
  const content = parsed.success ? parsed.data.choices[0]?.message?.content : undefined;
  if (!content) {
    throw new Error('Groq API returned empty content.');
  }
  return content;
}

/** Answers a question using only the dataset digest as context. */
export async function chatWithData(
  settings: GroqSettings,
  question: string,
  dataSummary: string,
): Promise<string> {
  return createChatCompletion(settings, [
    {
      role: 'system',
      content: `
You are a Data Analyst. Answer based ONLY on this summary:
${dataSummary}
If the answer isn't there, say so. Keep answers concise.
      `.trim(),
    },
    { role: 'user', content: question },
  ]);
}

export type InsightStats = {
  rows: number;
  cols: string[];
  sentiment_counts: SentimentCounts | 'No sentiment data';
};

/** Three short business observations about a dataset's sentiment balance. */
export async function generateInsights(
  settings: GroqSettings,
  fileName: string,
  stats: InsightStats,
): Promise<string> {
  return createChatCompletion(settings, [
    {
      role: 'user',
      content: `
Analyze this dataset metadata for '${fileName}': ${JSON.stringify(stats)}

Provide 3 brief, high-level business insights or observations in a numbered list.
Focus on sentiment balance and data volume.
      `.trim(),
    },
  ]);
}
