import fs from 'fs/promises';
import { ContentValidationError } from '../utils/errors.js';

export interface ContentSnapshot {
  data: Buffer;
  loadedAt: Date;
}

export interface ContentStats {
  reloads: number;
  failedReloads: number;
}

/**
 * Read the served file and reject content that must not replace what is
 * currently served.
 */
export async function readContent(filePath: string): Promise<Buffer> {
  const data = await fs.readFile(filePath);
  if (data.length === 0) {
    throw new ContentValidationError(filePath, 'file is empty');
  }
  return data;
}

/**
 * Holds the last good copy of the served file.
 * A failed reload leaves the previous snapshot in place.
 */
export class ContentStore {
  private snapshot: ContentSnapshot | null = null;
  private reloads = 0;
  private failedReloads = 0;

  get(): ContentSnapshot | null {
    return this.snapshot;
  }

  update(data: Buffer, loadedAt: Date = new Date()): void {
    this.snapshot = { data, loadedAt };
    this.reloads++;
  }

  recordFailure(): void {
    this.failedReloads++;
  }

  getStats(): ContentStats {
    return { reloads: this.reloads, failedReloads: this.failedReloads };
  }
}
