import type { RemoteBackend } from '../core/interfaces.js';
import { ErrorCode, fail, FailureCode, ok, RemoteProvider, Result } from '../types/index.js';

/**
 * In-memory remote backend, test-only and kept out of the build.
 * Stands in for a bucket object in tests; `null` content means the object
 * does not exist yet.
 */
export class MemoryBackend implements RemoteBackend {
  readonly kind = 'remote' as const;
  readonly provider: RemoteProvider = 's3';
  readonly bucket: string;
  content: string | null;
  connectError?: FailureCode;
  failReads = false;
  failWrites = false;
  writes = 0;

  constructor(bucket: string = 'memory', content: string | null = null) {
    this.bucket = bucket;
    this.content = content;
  }

  async connect(): Promise<Result<void>> {
    if (this.connectError) {
      return fail(this.connectError, `Bucket ${this.bucket} unavailable`);
    }
    if (this.content === null) {
      return this.overwrite('{}');
    }
    return ok(undefined);
  }

  async exists(): Promise<boolean> {
    return this.content !== null;
  }

  async fetch(): Promise<Result<string>> {
    if (this.failReads) {
      return fail(ErrorCode.ServerError, 'Read rejected');
    }
    return ok(this.content ?? '');
  }

  async overwrite(text: string): Promise<Result<void>> {
    if (this.failWrites) {
      return fail(ErrorCode.ServerError, 'Write rejected');
    }
    this.content = text;
    this.writes++;
    return ok(undefined);
  }
}
