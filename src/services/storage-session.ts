import { decode, encode, hideMeta, withMeta } from '../core/document-codec.js';
import { IdAllocator } from '../core/id-allocator.js';
import type { RemoteBackendFactory, StorageBackend } from '../core/interfaces.js';
import {
  DegradedCode,
  DocumentMeta,
  ErrorCode,
  FailureCode,
  HealthReport,
  Note,
  NoteBody,
  NoteDocument,
  RemoteProvider,
  Result,
  SessionMode,
  SessionStatus,
  SetupOutcome,
  fail,
  ok,
} from '../types/index.js';
import { checkString, parseId } from '../utils/validation.js';
import logger from '../utils/logger.js';

export interface StorageSessionOptions {
  /** Fallback used whenever the remote store cannot be used. */
  local: StorageBackend;
  remoteFactory: RemoteBackendFactory;
  provider: RemoteProvider;
}

export interface DeleteOutcome {
  id: number;
  deleted: boolean;
}

const DEGRADED: Record<FailureCode, DegradedCode> = {
  [ErrorCode.NotFound]: ErrorCode.NotFoundUseLocal,
  [ErrorCode.PermissionDenied]: ErrorCode.PermissionDeniedUseLocal,
  [ErrorCode.ServerError]: ErrorCode.ServerErrorUseLocal,
  [ErrorCode.InvalidInput]: ErrorCode.ServerErrorUseLocal,
  [ErrorCode.SetupRequired]: ErrorCode.ServerErrorUseLocal,
};

const DEGRADED_MESSAGES: Record<DegradedCode, string> = {
  [ErrorCode.NotFoundUseLocal]: 'Bucket not found. Using local storage.',
  [ErrorCode.PermissionDeniedUseLocal]: 'Permission denied for bucket. Using local storage.',
  [ErrorCode.ServerErrorUseLocal]: 'Remote storage unavailable. Using local storage.',
};

const zeroMeta = (): DocumentMeta => ({ id_count: 0, old_ids: [] });

/**
 * Owns backend selection and the id allocator, and runs every note
 * operation as a full read-modify-write of the single document.
 *
 * Operations are serialized within the process. Nothing guards against a
 * second process writing the same remote object.
 */
export class StorageSession {
  private readonly local: StorageBackend;
  private readonly remoteFactory: RemoteBackendFactory;
  private readonly provider: RemoteProvider;
  private readonly allocator = new IdAllocator();
  private mode: SessionMode = 'uninitialized';
  private backend: StorageBackend | null = null;
  private bucket: string | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: StorageSessionOptions) {
    this.local = options.local;
    this.remoteFactory = options.remoteFactory;
    this.provider = options.provider;
  }

  /**
   * Pick the authoritative backend for `bucketName`.
   *
   * An unusable remote store is not an error: the session switches to the
   * local file and the outcome carries a degraded code. If the chosen
   * backend's metadata cannot be loaded, the session keeps its previous
   * backend and counters.
   */
  async setup(bucketName: unknown): Promise<Result<SetupOutcome>> {
    if (typeof bucketName !== 'string' || !checkString(bucketName)) {
      return fail(ErrorCode.InvalidInput, 'Bucket name must be a non-empty string');
    }
    const bucket = bucketName.trim();

    return this.exclusive(async (): Promise<Result<SetupOutcome>> => {
      const connected = await this.connectRemote(bucket);

      if (connected.ok) {
        const meta = await this.ensureMeta(connected.value);
        if (!meta.ok) {
          logger.error({ bucket, code: meta.error.code }, 'Remote metadata could not be loaded, setup aborted');
          return meta;
        }
        this.bind(bucket, 'online', connected.value, meta.value);
        logger.info({ bucket, provider: this.provider }, 'Setup complete, using remote storage');
        const outcome: SetupOutcome = { bucket, mode: 'online', message: 'Setup complete.' };
        return ok(outcome);
      }

      const degraded = DEGRADED[connected.error.code];
      logger.warn({ bucket, code: degraded, reason: connected.error.message }, 'Remote storage unusable, falling back to local file');
      const meta = await this.ensureMeta(this.local);
      if (!meta.ok) {
        logger.error({ bucket, code: meta.error.code }, 'Local metadata could not be loaded, setup aborted');
        return meta;
      }
      this.bind(bucket, 'offline', this.local, meta.value);
      const outcome: SetupOutcome = { bucket, mode: 'offline', degraded, message: DEGRADED_MESSAGES[degraded] };
      return ok(outcome);
    });
  }

  /**
   * Liveness probe. Never fails.
   */
  async healthCheck(): Promise<HealthReport> {
    const ready = await this.isReady();
    return {
      ready,
      mode: this.mode,
      message: ready ? 'Server is responding. Setup has been run.' : 'Server is responding. Setup has not been run.',
    };
  }

  status(): SessionStatus {
    const meta = this.allocator.snapshot();
    return {
      mode: this.mode,
      bucket: this.bucket,
      provider: this.provider,
      idCount: meta.id_count,
      recycledIds: meta.old_ids.length,
    };
  }

  async add(title: unknown, content: unknown): Promise<Result<Note>> {
    if (typeof title !== 'string' || typeof content !== 'string' || !checkString(title, content)) {
      return fail(ErrorCode.InvalidInput, 'Title and content must be non-empty strings');
    }

    return this.exclusive(async (): Promise<Result<Note>> => {
      const backend = await this.requireSetup();
      if (!backend.ok) {
        return backend;
      }
      const document = await this.load(backend.value);
      if (!document.ok) {
        return document;
      }

      const before = this.allocator.snapshot();
      const id = this.allocator.allocate();
      document.value.notes[String(id)] = { title, content };

      const saved = await this.persist(backend.value, document.value, before);
      if (!saved.ok) {
        return saved;
      }
      logger.info({ id }, 'Note added');
      return ok({ id, title, content });
    });
  }

  /**
   * Without an id, every note keyed by id; with one, that single note.
   */
  async get(): Promise<Result<Record<string, NoteBody>>>;
  async get(id: unknown): Promise<Result<NoteBody>>;
  async get(id?: unknown): Promise<Result<Record<string, NoteBody> | NoteBody>> {
    const key = id === undefined ? undefined : parseId(id);
    if (key === null) {
      return fail(ErrorCode.InvalidInput, 'Id must be a non-negative integer');
    }

    return this.exclusive(async (): Promise<Result<Record<string, NoteBody> | NoteBody>> => {
      const backend = await this.requireSetup();
      if (!backend.ok) {
        return backend;
      }
      const document = await this.load(backend.value);
      if (!document.ok) {
        return document;
      }

      if (key === undefined) {
        return ok(hideMeta(document.value));
      }
      const note = document.value.notes[key];
      if (!note) {
        return fail(ErrorCode.NotFound, `Note ${key} not found`);
      }
      return ok({ title: note.title, content: note.content });
    });
  }

  /**
   * Remove a note and queue its id for reuse. Deleting an absent id succeeds
   * without writing anything.
   */
  async delete(id: unknown): Promise<Result<DeleteOutcome>> {
    const key = parseId(id);
    if (key === null) {
      return fail(ErrorCode.InvalidInput, 'Id must be a non-negative integer');
    }
    const numericId = Number(key);

    return this.exclusive(async (): Promise<Result<DeleteOutcome>> => {
      const backend = await this.requireSetup();
      if (!backend.ok) {
        return backend;
      }
      const document = await this.load(backend.value);
      if (!document.ok) {
        return document;
      }

      if (!(key in document.value.notes)) {
        logger.debug({ id: numericId }, 'Note not present, nothing to delete');
        return ok({ id: numericId, deleted: false });
      }

      const before = this.allocator.snapshot();
      delete document.value.notes[key];
      this.allocator.release(numericId);

      const saved = await this.persist(backend.value, document.value, before);
      if (!saved.ok) {
        return saved;
      }
      logger.info({ id: numericId }, 'Note deleted');
      return ok({ id: numericId, deleted: true });
    });
  }

  private async connectRemote(bucket: string): Promise<Result<StorageBackend>> {
    try {
      const remote = this.remoteFactory(bucket);
      const connected = await remote.connect();
      return connected.ok ? ok(remote) : connected;
    } catch (error) {
      // Client construction can throw on bad endpoint or credential config
      logger.error({ error, bucket }, 'Remote backend could not be created');
      return fail(ErrorCode.ServerError, 'Remote backend could not be created', error);
    }
  }

  /**
   * Read the document's `_meta`, writing a zeroed one when it is missing.
   * The allocator is left alone; `bind` seeds it once the backend is chosen.
   */
  private async ensureMeta(backend: StorageBackend): Promise<Result<DocumentMeta>> {
    const document = await this.load(backend);
    if (!document.ok) {
      return document;
    }

    const existing = document.value.meta;
    if (existing) {
      logger.debug({ meta: existing, kind: backend.kind }, 'Loaded document metadata');
      return ok(existing);
    }

    const meta = zeroMeta();
    const saved = await backend.overwrite(encode(withMeta(document.value, meta), { pretty: backend.kind === 'local' }));
    if (!saved.ok) {
      return saved;
    }
    logger.info({ kind: backend.kind }, 'Initialized document metadata');
    return ok(meta);
  }

  private bind(bucket: string, mode: SessionMode, backend: StorageBackend, meta: DocumentMeta): void {
    this.bucket = bucket;
    this.mode = mode;
    this.backend = backend;
    this.allocator.restore(meta);
  }

  private async isReady(): Promise<boolean> {
    if (this.mode === 'uninitialized' || !this.backend) {
      return false;
    }
    if (this.mode === 'offline') {
      return this.local.exists();
    }
    return true;
  }

  private async requireSetup(): Promise<Result<StorageBackend>> {
    const backend = this.backend;
    if (!backend || !(await this.isReady())) {
      return fail(ErrorCode.SetupRequired, 'Setup must be run before using notes');
    }
    return ok(backend);
  }

  private async load(backend: StorageBackend): Promise<Result<NoteDocument>> {
    const raw = await backend.fetch();
    if (!raw.ok) {
      return raw;
    }
    return ok(decode(raw.value));
  }

  /**
   * Write notes and the allocator's current state in one overwrite. On
   * failure the allocator goes back to `before`.
   */
  private async persist(backend: StorageBackend, document: NoteDocument, before: DocumentMeta): Promise<Result<void>> {
    const text = encode(withMeta(document, this.allocator.snapshot()), { pretty: backend.kind === 'local' });
    const saved = await backend.overwrite(text);
    if (!saved.ok) {
      this.allocator.restore(before);
      logger.error({ code: saved.error.code, kind: backend.kind }, 'Failed to persist document');
    }
    return saved;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The chain only orders tasks; each task's failure reaches its own caller
    this.queue = run.catch(() => undefined);
    return run;
  }
}
