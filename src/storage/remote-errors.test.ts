import { describe, expect, it } from 'vitest';
import { classifyRemoteError, describeError, statusOf } from './remote-errors.js';
import { ErrorCode } from '../types/index.js';

function awsError(name: string, httpStatusCode?: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

function nanoError(statusCode: number, error: string): Error {
  return Object.assign(new Error(error), { statusCode, error });
}

describe('remote error classification', () => {
  it('reads the status code of AWS and nano errors', () => {
    expect(statusOf(awsError('NotFound', 404))).toBe(404);
    expect(statusOf(nanoError(401, 'unauthorized'))).toBe(401);
    expect(statusOf('boom')).toBeUndefined();
  });

  it('classifies missing buckets and objects as not found', () => {
    expect(classifyRemoteError(awsError('NotFound', 404))).toBe(ErrorCode.NotFound);
    expect(classifyRemoteError(awsError('NoSuchBucket'))).toBe(ErrorCode.NotFound);
    expect(classifyRemoteError(nanoError(404, 'not_found'))).toBe(ErrorCode.NotFound);
  });

  it('classifies refused credentials as permission denied', () => {
    expect(classifyRemoteError(awsError('Forbidden', 403))).toBe(ErrorCode.PermissionDenied);
    expect(classifyRemoteError(awsError('AccessDenied'))).toBe(ErrorCode.PermissionDenied);
    expect(classifyRemoteError(nanoError(401, 'unauthorized'))).toBe(ErrorCode.PermissionDenied);
  });

  it('treats everything else as a server error', () => {
    expect(classifyRemoteError(awsError('InternalError', 500))).toBe(ErrorCode.ServerError);
    expect(classifyRemoteError(new Error('ECONNREFUSED'))).toBe(ErrorCode.ServerError);
    expect(classifyRemoteError(undefined)).toBe(ErrorCode.ServerError);
  });

  it('describes errors by message', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
