/**
 * Core type definitions for note-vault
 */

export type RemoteProvider = 's3' | 'couchdb';

export interface S3Config {
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
}

export interface CouchDBConfig {
  url: string;
  username?: string;
  password?: string;
}

export interface StorageConfig {
  provider: RemoteProvider;
  objectName: string;
  localFile: string;
  setupBucket?: string;
  s3: S3Config;
  couchdb: CouchDBConfig;
}

export interface AppConfig {
  storage: StorageConfig;
  server: {
    port: number;
    host: string;
  };
  apiKey?: string;
}

/**
 * Error kinds surfaced by the storage layer.
 * The three *UseLocal codes only come out of setup and mean the service
 * keeps working on the local file.
 */
export enum ErrorCode {
  InvalidInput = 'InvalidInput',
  NotFound = 'NotFound',
  PermissionDenied = 'PermissionDenied',
  ServerError = 'ServerError',
  SetupRequired = 'SetupRequired',
  NotFoundUseLocal = 'NotFoundUseLocal',
  PermissionDeniedUseLocal = 'PermissionDeniedUseLocal',
  ServerErrorUseLocal = 'ServerErrorUseLocal',
}

export type DegradedCode =
  | ErrorCode.NotFoundUseLocal
  | ErrorCode.PermissionDeniedUseLocal
  | ErrorCode.ServerErrorUseLocal;

export type FailureCode =
  | ErrorCode.InvalidInput
  | ErrorCode.NotFound
  | ErrorCode.PermissionDenied
  | ErrorCode.ServerError
  | ErrorCode.SetupRequired;

export interface StorageError {
  code: FailureCode;
  message: string;
  cause?: unknown;
}

export type Result<T, E = StorageError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(code: FailureCode, message: string, cause?: unknown): Result<never> {
  return { ok: false, error: { code, message, cause } };
}

/**
 * A note as stored in the document. The id is the document key.
 */
export interface NoteBody {
  title: string;
  content: string;
}

export interface Note extends NoteBody {
  id: number;
}

export interface DocumentMeta {
  id_count: number;
  old_ids: number[];
}

export const META_KEY = '_meta';

/**
 * The single persisted unit: decimal id keys to notes, plus `_meta`.
 */
export interface NoteDocument {
  notes: Record<string, NoteBody>;
  meta?: DocumentMeta;
}

export type SessionMode = 'uninitialized' | 'online' | 'offline';

export interface SetupOutcome {
  bucket: string;
  mode: Exclude<SessionMode, 'uninitialized'>;
  degraded?: DegradedCode;
  message: string;
}

export interface HealthReport {
  ready: boolean;
  mode: SessionMode;
  message: string;
}

export interface SessionStatus {
  mode: SessionMode;
  bucket: string | null;
  provider: RemoteProvider;
  idCount: number;
  recycledIds: number;
}
