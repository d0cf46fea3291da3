/**
 * Core interfaces for the storage layer
 * Both backends hold exactly one document and replace it wholesale.
 */

import type { RemoteProvider, Result } from '../types/index.js';

export type BackendKind = 'remote' | 'local';

/**
 * One place the note document can live.
 *
 * Expected failures come back as `{ ok: false }` results; nothing here
 * throws for a missing object, a refused credential or an I/O error.
 */
export interface StorageBackend {
  readonly kind: BackendKind;

  /**
   * Full raw document text. A missing or empty object yields ''.
   */
  fetch(): Promise<Result<string>>;

  /**
   * Replace the whole document.
   */
  overwrite(text: string): Promise<Result<void>>;

  /**
   * Whether the backing object or file is present.
   */
  exists(): Promise<boolean>;
}

/**
 * A single object inside a named bucket on a remote store.
 */
export interface RemoteBackend extends StorageBackend {
  readonly kind: 'remote';
  readonly provider: RemoteProvider;
  readonly bucket: string;

  /**
   * Verify the bucket and create the object with an empty document when
   * missing. Failures are classified as NotFound, PermissionDenied or
   * ServerError.
   */
  connect(): Promise<Result<void>>;
}

export type RemoteBackendFactory = (bucket: string) => RemoteBackend;
