import Nano from 'nano';
import type { RemoteBackend } from '../core/interfaces.js';
import { CouchDBConfig, ErrorCode, fail, ok, Result } from '../types/index.js';
import logger from '../utils/logger.js';
import { classifyRemoteError, describeError } from './remote-errors.js';

/**
 * CouchDB document holding the encoded note document in `content`.
 */
export interface StoredNoteDocument {
  content: string;
}

/**
 * CouchDB-backed remote store
 * The bucket is a CouchDB database and the object is a single document in it
 */
export class CouchDocumentBackend implements RemoteBackend {
  readonly kind = 'remote' as const;
  readonly provider = 'couchdb' as const;
  readonly bucket: string;
  private readonly docId: string;
  private nano: Nano.ServerScope;
  private db: Nano.DocumentScope<StoredNoteDocument>;

  constructor(bucket: string, docId: string, config: CouchDBConfig) {
    this.bucket = bucket;
    this.docId = docId;

    const url =
      config.username && config.password
        ? config.url.replace('://', `://${config.username}:${config.password}@`)
        : config.url;

    this.nano = Nano(url);
    this.db = this.nano.db.use<StoredNoteDocument>(bucket);
  }

  async connect(): Promise<Result<void>> {
    try {
      await this.nano.db.get(this.bucket);
    } catch (error) {
      return this.failure(error, 'Database check failed');
    }

    const present = await this.headDocument();
    if (!present.ok) {
      return present;
    }
    if (present.value) {
      logger.info({ database: this.bucket, docId: this.docId }, 'Remote document found');
      return ok(undefined);
    }

    logger.info({ database: this.bucket, docId: this.docId }, 'Remote document missing, creating it');
    return this.overwrite('{}');
  }

  async exists(): Promise<boolean> {
    const present = await this.headDocument();
    return present.ok && present.value;
  }

  async fetch(): Promise<Result<string>> {
    const current = await this.current();
    if (!current.ok) {
      return current;
    }
    return ok(current.value?.content ?? '');
  }

  /**
   * Replace the stored document, carrying over the current revision.
   */
  async overwrite(text: string): Promise<Result<void>> {
    const current = await this.current();
    if (!current.ok) {
      return current;
    }

    try {
      await this.db.insert({ _id: this.docId, _rev: current.value?._rev, content: text });
      return ok(undefined);
    } catch (error) {
      return this.failure(error, 'Remote save failed');
    }
  }

  private async headDocument(): Promise<Result<boolean>> {
    try {
      await this.db.head(this.docId);
      return ok(true);
    } catch (error) {
      if (classifyRemoteError(error) === ErrorCode.NotFound) {
        return ok(false);
      }
      return this.failure(error, 'Remote existence check failed');
    }
  }

  private async current(): Promise<Result<(Nano.DocumentGetResponse & StoredNoteDocument) | null>> {
    try {
      return ok(await this.db.get(this.docId));
    } catch (error) {
      if (classifyRemoteError(error) === ErrorCode.NotFound) {
        return ok(null);
      }
      return this.failure(error, 'Remote fetch failed');
    }
  }

  private failure(error: unknown, message: string): Result<never> {
    const code = classifyRemoteError(error);
    logger.error({ error, code, database: this.bucket, docId: this.docId }, message);
    return fail(code, `${message}: ${describeError(error)}`, error);
  }
}
