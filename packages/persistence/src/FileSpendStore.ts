import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { SpendCounterCorruptError } from '@enrich/core';
import type { SpendStore } from '@enrich/core';

export interface FileSpendStoreOptions {
  path: string;
}

/**
 * Spend counter kept as a single integer in a text file.
 *
 * Writes are plain overwrites with no locking: at most one process may use a
 * given file at a time. Use DynamoSpendStore when batches can overlap.
 */
export class FileSpendStore implements SpendStore {
  private readonly path: string;

  constructor(options: FileSpendStoreOptions) {
    if (!options.path) {
      throw new Error('SPEND_COUNTER_PATH must be provided for FileSpendStore');
    }
    this.path = options.path;
  }

  get location(): string {
    return this.path;
  }

  async read(): Promise<number | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const text = raw.trim();
    if (!/^\d+$/.test(text)) {
      throw new SpendCounterCorruptError(this.path, raw);
    }
    const value = Number.parseInt(text, 10);
    if (!Number.isSafeInteger(value)) {
      throw new SpendCounterCorruptError(this.path, raw);
    }
    return value;
  }

  async write(used: number, _delta?: number): Promise<number> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, String(used), 'utf8');
    return used;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
