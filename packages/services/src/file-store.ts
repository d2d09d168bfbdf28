/**
 * File store
 *
 * Flat directory, one file per record, named exactly by its storage
 * filename. Writes are published atomically: content goes to a hidden
 * temporary file beside the target and is renamed into place.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import { isPlainFilename, type Logger } from '@pixhold/utils';

const TEMP_SUFFIX = '.tmp';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class FileStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileStoreError';
  }
}

export class FileStore {
  constructor(
    readonly rootDir: string,
    private logger: Logger
  ) {}

  /**
   * Ensure the directory exists and sweep temp files left by a crash
   */
  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });

    const entries = await fs.readdir(this.rootDir);
    for (const entry of entries) {
      if (entry.startsWith('.') && entry.endsWith(TEMP_SUFFIX)) {
        await fs.rm(path.join(this.rootDir, entry), { force: true });
        this.logger.warn({ file: entry }, 'Removed stale temporary upload');
      }
    }
  }

  /**
   * Absolute path for a stored filename; rejects anything that is not a
   * single path segment
   */
  resolve(filename: string): string {
    if (!isPlainFilename(filename) || filename.startsWith('.')) {
      throw new FileStoreError(`Invalid storage filename: ${JSON.stringify(filename)}`);
    }
    return path.join(this.rootDir, filename);
  }

  async write(filename: string, content: Uint8Array): Promise<void> {
    const target = this.resolve(filename);
    const temp = path.join(this.rootDir, `.${filename}.${randomUUID()}${TEMP_SUFFIX}`);

    try {
      await fs.writeFile(temp, content, { flag: 'wx' });
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.error({ err: cleanupErr, file: temp }, 'Failed to remove temporary upload');
      });
      throw new FileStoreError(`Failed to write ${filename}`, { cause: err });
    }
  }

  async read(filename: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(this.resolve(filename));
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Returns false when the file was already gone
   */
  async remove(filename: string): Promise<boolean> {
    try {
      await fs.unlink(this.resolve(filename));
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return false;
      }
      throw err;
    }
  }

  /** Stored filenames, temp files excluded */
  async list(): Promise<string[]> {
    const entries = await fs.readdir(this.rootDir);
    return entries.filter((entry) => !entry.startsWith('.')).sort();
  }
}

const CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif'
};

export function contentTypeFor(filename: string): string {
  const extension = path.extname(filename).slice(1).toLowerCase();
  return CONTENT_TYPES[extension] ?? 'application/octet-stream';
}
