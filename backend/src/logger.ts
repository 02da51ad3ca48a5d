import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
      const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} ${lvl}: ${String(message)}${extra}`;
    }),
  ),
  transports: [new winston.transports.Console()],
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
