import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DATA_DIR: z.string().min(1).default('data'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  TOP_TOPICS: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  GROQ_API_KEY: z.string().min(1).optional(),
  GROQ_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Validates environment variables into the service configuration.
 * Empty strings count as unset so `.env` templates can leave keys blank.
 * Throws with every failing key listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = ConfigSchema.safeParse(cleaned);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
