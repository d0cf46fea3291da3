/**
 * S3-compatible object backend.
 * Works with AWS S3 and any endpoint speaking the S3 API.
 */

import {
  S3Client,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import type { RemoteBackend } from '../core/interfaces.js';
import { ErrorCode, fail, ok, Result, S3Config } from '../types/index.js';
import logger from '../utils/logger.js';
import { classifyRemoteError, describeError } from './remote-errors.js';

export class S3ObjectBackend implements RemoteBackend {
  readonly kind = 'remote' as const;
  readonly provider = 's3' as const;
  readonly bucket: string;
  private readonly key: string;
  private client: S3Client;

  constructor(bucket: string, key: string, config: S3Config) {
    this.bucket = bucket;
    this.key = key;

    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      credentials:
        config.accessKeyId && config.secretAccessKey
          ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
          : undefined,
      forcePathStyle: config.forcePathStyle || !!config.endpoint,
    });
  }

  async connect(): Promise<Result<void>> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      return this.failure(error, 'Bucket check failed');
    }

    const present = await this.headObject();
    if (!present.ok) {
      return present;
    }
    if (present.value) {
      logger.info({ bucket: this.bucket, key: this.key }, 'Remote document found');
      return ok(undefined);
    }

    logger.info({ bucket: this.bucket, key: this.key }, 'Remote document missing, creating it');
    return this.overwrite('{}');
  }

  async exists(): Promise<boolean> {
    const present = await this.headObject();
    return present.ok && present.value;
  }

  /**
   * Download the full object. A missing object reads as ''.
   */
  async fetch(): Promise<Result<string>> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: this.key,
        })
      );
      if (!response.Body) {
        return ok('');
      }
      return ok(await response.Body.transformToString('utf-8'));
    } catch (error) {
      if (error instanceof Error && error.name === 'NoSuchKey') {
        return ok('');
      }
      return this.failure(error, 'Remote download failed');
    }
  }

  async overwrite(text: string): Promise<Result<void>> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.key,
          Body: text,
          ContentType: 'application/json',
        })
      );
      return ok(undefined);
    } catch (error) {
      return this.failure(error, 'Remote upload failed');
    }
  }

  private async headObject(): Promise<Result<boolean>> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.key }));
      return ok(true);
    } catch (error) {
      if (classifyRemoteError(error) === ErrorCode.NotFound) {
        return ok(false);
      }
      return this.failure(error, 'Remote existence check failed');
    }
  }

  private failure(error: unknown, message: string): Result<never> {
    const code = classifyRemoteError(error);
    logger.error({ error, code, bucket: this.bucket, key: this.key }, message);
    return fail(code, `${message}: ${describeError(error)}`, error);
  }
}
