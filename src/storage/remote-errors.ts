import { ErrorCode, FailureCode } from '../types/index.js';

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchBucket', 'NoSuchKey', 'not_found']);
const DENIED_NAMES = new Set(['Forbidden', 'AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'unauthorized', 'forbidden']);

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * HTTP status carried by an SDK error: `$metadata.httpStatusCode` for the
 * AWS SDK, `statusCode` for nano.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const metadata: unknown = Reflect.get(error, '$metadata');
  if (typeof metadata === 'object' && metadata !== null) {
    const status = readNumber(metadata, 'httpStatusCode');
    if (status !== undefined) {
      return status;
    }
  }
  return readNumber(error, 'statusCode');
}

function namesOf(error: unknown): string[] {
  if (typeof error !== 'object' || error === null) {
    return [];
  }
  return ['name', 'Code', 'error'].flatMap((key) => {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? [value] : [];
  });
}

/**
 * Sort a remote store failure into one of the three kinds setup reacts to.
 */
export function classifyRemoteError(error: unknown): FailureCode {
  const status = statusOf(error);
  const names = namesOf(error);
  if (status === 404 || names.some((name) => NOT_FOUND_NAMES.has(name))) {
    return ErrorCode.NotFound;
  }
  if (status === 401 || status === 403 || names.some((name) => DENIED_NAMES.has(name))) {
    return ErrorCode.PermissionDenied;
  }
  return ErrorCode.ServerError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
