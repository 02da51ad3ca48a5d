import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { LoadedDataset, prepareDataset } from '../analysis/analyzer';
import { HttpError } from '../errors';
import { logger } from '../logger';
import { datasetFormat } from './loader';

export type StoredFile = {
  name: string;
  size: number;
  modifiedAt: string;
};

function safeFileName(raw: string): string {
  const name = path.basename(raw.trim());
  if (!name || name === '.' || name === '..') {
    throw new HttpError(400, 'INVALID_FILENAME', 'A file name is required.');
  }
  if (!datasetFormat(name)) {
    throw new HttpError(
      400,
      'UNSUPPORTED_FILE',
      `Unsupported file type for "${name}". Allowed: csv, json, xls, xlsx.`,
    );
  }
  return name;
}

/**
 * Uploaded files on disk plus the single dataset currently being analyzed.
 * Loading a dataset replaces the previous one.
 */
export class DatasetStore {
  private current: LoadedDataset | null = null;

  constructor(private readonly dataDir: string) {}

  async listFiles(): Promise<StoredFile[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dataDir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const files: Array<StoredFile & { mtimeMs: number }> = [];
    for (const name of entries) {
      if (!datasetFormat(name)) continue;
      const info = await stat(path.join(this.dataDir, name));
      if (!info.isFile()) continue;
      files.push({
        name,
        size: info.size,
        modifiedAt: info.mtime.toISOString(),
        mtimeMs: info.mtimeMs,
      });
    }

    return files
      .sort((a, b) => b.mtimeMs - a.mtimeMs)
      .map(({ name, size, modifiedAt }) => ({ name, size, modifiedAt }));
  }

  async saveUpload(rawName: string, buffer: Buffer): Promise<LoadedDataset> {
    const name = safeFileName(rawName);
    const dataset = prepareDataset(name, buffer);

    await mkdir(this.dataDir, { recursive: true });
    await writeFile(path.join(this.dataDir, name), buffer);

    this.current = dataset;
    return dataset;
  }

  async loadFile(rawName: string): Promise<LoadedDataset> {
    const name = safeFileName(rawName);
    let buffer: Buffer;
    try {
      buffer = await readFile(path.join(this.dataDir, name));
    } catch {
      throw new HttpError(404, 'FILE_NOT_FOUND', `File not found: ${name}`);
    }

    const dataset = prepareDataset(name, buffer);
    this.current = dataset;
    return dataset;
  }

  getCurrent(): LoadedDataset | null {
    return this.current;
  }

  requireCurrent(): LoadedDataset {
    if (!this.current) {
      throw new HttpError(409, 'NO_DATASET', 'No dataset loaded. Upload or load a file first.');
    }
    return this.current;
  }

  clear(): void {
    if (this.current) {
      logger.info('Dataset cleared', { file: this.current.fileName });
    }
    this.current = null;
  }
}
