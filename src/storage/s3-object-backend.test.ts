import { describe, it, expect, vi, beforeEach } from 'vitest';
import { S3ObjectBackend } from './s3-object-backend.js';
import { ErrorCode } from '../types/index.js';
import type { S3Config } from '../types/index.js';

interface SentCommand {
  type: string;
  input: Record<string, unknown>;
}

const mocks = vi.hoisted(() => {
  const configs: Array<Record<string, unknown>> = [];
  return { send: vi.fn<(command: SentCommand) => Promise<unknown>>(), configs };
});

// All exports that are used with `new` must be classes
vi.mock('@aws-sdk/client-s3', () => {
  class MockS3Client {
    constructor(config: Record<string, unknown>) {
      mocks.configs.push(config);
    }
    send(command: SentCommand) {
      return mocks.send(command);
    }
  }
  const command = (name: string) =>
    class {
      type = name;
      constructor(public input: Record<string, unknown>) {}
    };
  return {
    S3Client: MockS3Client,
    GetObjectCommand: command('GetObject'),
    HeadBucketCommand: command('HeadBucket'),
    HeadObjectCommand: command('HeadObject'),
    PutObjectCommand: command('PutObject'),
  };
});

function awsError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

function sentTypes(): string[] {
  return mocks.send.mock.calls.map(([command]) => command.type);
}

describe('S3ObjectBackend', () => {
  const config: S3Config = {
    region: 'us-east-1',
    accessKeyId: 'test-key',
    secretAccessKey: 'test-secret',
    forcePathStyle: false,
  };

  let backend: S3ObjectBackend;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.configs.length = 0;
    backend = new S3ObjectBackend('notes-bucket', 'notes.json', config);
  });

  describe('constructor', () => {
    it('passes region and credentials to the client', () => {
      expect(mocks.configs[0]).toEqual({
        endpoint: undefined,
        region: 'us-east-1',
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
        forcePathStyle: false,
      });
    });

    it('uses path-style addressing with a custom endpoint', () => {
      new S3ObjectBackend('b', 'k', { region: 'us-east-1', endpoint: 'http://localhost:9000', forcePathStyle: false });

      expect(mocks.configs[1]).toMatchObject({ endpoint: 'http://localhost:9000', forcePathStyle: true, credentials: undefined });
    });

    it('exposes its bucket and provider', () => {
      expect(backend.kind).toBe('remote');
      expect(backend.provider).toBe('s3');
      expect(backend.bucket).toBe('notes-bucket');
    });
  });

  describe('connect', () => {
    it('leaves an existing object untouched', async () => {
      mocks.send.mockResolvedValue({});

      const result = await backend.connect();

      expect(result).toEqual({ ok: true, value: undefined });
      expect(sentTypes()).toEqual(['HeadBucket', 'HeadObject']);
    });

    it('creates the object with an empty document when missing', async () => {
      mocks.send
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(awsError('NotFound', 404))
        .mockResolvedValueOnce({});

      const result = await backend.connect();

      expect(result.ok).toBe(true);
      expect(sentTypes()).toEqual(['HeadBucket', 'HeadObject', 'PutObject']);
      expect(mocks.send.mock.calls[2][0].input).toEqual({
        Bucket: 'notes-bucket',
        Key: 'notes.json',
        Body: '{}',
        ContentType: 'application/json',
      });
    });

    it('does not recreate an object it is not allowed to inspect', async () => {
      mocks.send.mockResolvedValueOnce({}).mockRejectedValueOnce(awsError('Forbidden', 403));

      const result = await backend.connect();

      expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.PermissionDenied } });
      expect(sentTypes()).toEqual(['HeadBucket', 'HeadObject']);
    });

    it('reports a missing bucket as not found', async () => {
      mocks.send.mockRejectedValueOnce(awsError('NotFound', 404));

      const result = await backend.connect();

      expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.NotFound } });
    });

    it('reports refused access as permission denied', async () => {
      mocks.send.mockRejectedValueOnce(awsError('Forbidden', 403));

      const result = await backend.connect();

      expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.PermissionDenied } });
    });

    it('reports other failures as server errors', async () => {
      mocks.send.mockRejectedValueOnce(awsError('InternalError', 500));

      const result = await backend.connect();

      expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.ServerError } });
    });
  });

  describe('fetch', () => {
    it('downloads the object as text', async () => {
      mocks.send.mockResolvedValueOnce({
        Body: { transformToString: vi.fn(async () => '{"0":{"title":"a","content":"b"}}') },
      });

      const result = await backend.fetch();

      expect(result).toEqual({ ok: true, value: '{"0":{"title":"a","content":"b"}}' });
      expect(mocks.send.mock.calls[0][0].input).toEqual({ Bucket: 'notes-bucket', Key: 'notes.json' });
    });

    it('reads a missing object or empty body as empty text', async () => {
      mocks.send.mockRejectedValueOnce(awsError('NoSuchKey', 404)).mockResolvedValueOnce({});

      expect(await backend.fetch()).toEqual({ ok: true, value: '' });
      expect(await backend.fetch()).toEqual({ ok: true, value: '' });
    });

    it('classifies download failures', async () => {
      mocks.send.mockRejectedValueOnce(awsError('AccessDenied', 403));

      const result = await backend.fetch();

      expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.PermissionDenied } });
    });
  });

  describe('overwrite', () => {
    it('uploads the full document', async () => {
      mocks.send.mockResolvedValueOnce({});

      const result = await backend.overwrite('{"_meta":{"id_count":0,"old_ids":[]}}');

      expect(result.ok).toBe(true);
      expect(mocks.send.mock.calls[0][0]).toMatchObject({
        type: 'PutObject',
        input: { Body: '{"_meta":{"id_count":0,"old_ids":[]}}' },
      });
    });

    it('reports upload failures', async () => {
      mocks.send.mockRejectedValueOnce(new Error('socket hang up'));

      const result = await backend.overwrite('{}');

      expect(result).toMatchObject({
        ok: false,
        error: { code: ErrorCode.ServerError, message: 'Remote upload failed: socket hang up' },
      });
    });
  });

  describe('exists', () => {
    it('is true when the object head succeeds', async () => {
      mocks.send.mockResolvedValueOnce({});
      expect(await backend.exists()).toBe(true);
    });

    it('is false when the head request fails', async () => {
      mocks.send.mockRejectedValueOnce(awsError('NotFound', 404));
      expect(await backend.exists()).toBe(false);
    });
  });
});
