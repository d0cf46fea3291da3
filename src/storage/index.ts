import type { RemoteBackendFactory } from '../core/interfaces.js';
import type { StorageConfig } from '../types/index.js';
import { CouchDocumentBackend } from './couch-document-backend.js';
import { S3ObjectBackend } from './s3-object-backend.js';

export { LocalFileBackend } from './local-file-backend.js';
export { S3ObjectBackend, CouchDocumentBackend };

/**
 * Build remote backends for the configured provider.
 */
export function createRemoteBackendFactory(config: StorageConfig): RemoteBackendFactory {
  switch (config.provider) {
    case 'couchdb':
      return (bucket) => new CouchDocumentBackend(bucket, config.objectName, config.couchdb);
    case 's3':
      return (bucket) => new S3ObjectBackend(bucket, config.objectName, config.s3);
  }
}
