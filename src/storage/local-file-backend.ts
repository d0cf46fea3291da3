import { promises as fs } from 'fs';
import path from 'path';
import type { StorageBackend } from '../core/interfaces.js';
import { ErrorCode, fail, ok, Result } from '../types/index.js';
import logger from '../utils/logger.js';

/**
 * Local JSON file backend
 * Keeps the whole note document in one file on disk
 */
export class LocalFileBackend implements StorageBackend {
  readonly kind = 'local' as const;
  private readonly filePath: string;

  constructor(filePath: string = 'local_notes.json') {
    this.filePath = path.resolve(filePath);
  }

  get location(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Read the file, creating it empty first when absent.
   */
  async fetch(): Promise<Result<string>> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      // 'a' creates the file without truncating an existing one
      const handle = await fs.open(this.filePath, 'a');
      await handle.close();
      const content = await fs.readFile(this.filePath, 'utf-8');
      logger.debug({ filePath: this.filePath, bytes: content.length }, 'Local document loaded');
      return ok(content);
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Failed to read local document');
      return fail(ErrorCode.ServerError, `Failed to read ${this.filePath}`, error);
    }
  }

  async overwrite(text: string): Promise<Result<void>> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, text, 'utf-8');
      logger.debug({ filePath: this.filePath, bytes: text.length }, 'Local document saved');
      return ok(undefined);
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Failed to write local document');
      return fail(ErrorCode.ServerError, `Failed to write ${this.filePath}`, error);
    }
  }
}
