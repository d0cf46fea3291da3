import { describe, expect, it } from 'vitest';
import { loadConfig } from '../utils/config.js';
import { createRemoteBackendFactory, CouchDocumentBackend, S3ObjectBackend } from './index.js';

describe('createRemoteBackendFactory', () => {
  it('builds S3 object backends by default', () => {
    const factory = createRemoteBackendFactory(loadConfig({}).storage);

    const backend = factory('notes-bucket');

    expect(backend).toBeInstanceOf(S3ObjectBackend);
    expect(backend.bucket).toBe('notes-bucket');
    expect(backend.provider).toBe('s3');
  });

  it('builds CouchDB document backends when configured', () => {
    const factory = createRemoteBackendFactory(loadConfig({ REMOTE_PROVIDER: 'couchdb' }).storage);

    const backend = factory('notes-db');

    expect(backend).toBeInstanceOf(CouchDocumentBackend);
    expect(backend.bucket).toBe('notes-db');
    expect(backend.provider).toBe('couchdb');
  });
});
