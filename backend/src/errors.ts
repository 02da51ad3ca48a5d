import { Response } from 'express';
import { logger, errorMessage } from './logger';

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Raised when an uploaded file cannot be read as a dataset. */
export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetError';
  }
}

type Fallback = {
  status: number;
  code: string;
};

const INTERNAL: Fallback = { status: 500, code: 'INTERNAL_ERROR' };

export function sendError(res: Response, err: unknown, fallback: Fallback = INTERNAL) {
  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.code, message: err.message });
  }
  if (err instanceof DatasetError) {
    return res.status(400).json({ error: 'INVALID_DATASET', message: err.message });
  }

  logger.error('Request failed', { error: errorMessage(err) });
  return res.status(fallback.status).json({
    error: fallback.code,
    message: errorMessage(err) || 'Unknown error.',
  });
}
