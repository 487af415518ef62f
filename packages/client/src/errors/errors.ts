import type { ZodIssue } from 'zod';
import { isCredentialInvalid } from './error-code.js';
import type { ApiErrorCode, ApiErrorResponse } from './types.js';

/** Base error for every failure raised by the client. */
export class AuthError extends Error {
  override name = 'AuthError';
}

type HttpFailureReason = 'timeout' | 'connection' | 'request';

/** The request never produced an HTTP response (DNS, refused, reset, timeout). */
export class HttpError extends AuthError {
  override name = 'HttpError';

  constructor(
    message: string,
    public readonly reason: HttpFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The provider answered with a non-success status. `code` is the classified
 * form of `response.error.message`.
 */
export class ApiError extends AuthError {
  override name = 'ApiError';

  constructor(
    public readonly statusCode: number,
    public readonly code: ApiErrorCode,
    public readonly response: ApiErrorResponse,
  ) {
    super(`Identity provider rejected the request (${statusCode}): ${response.error.message}`);
  }
}

/** A response body was not JSON or did not have the expected shape. */
export class ResponseDecodeError extends AuthError {
  override name = 'ResponseDecodeError';

  constructor(
    message: string,
    public readonly body: unknown,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
  }
}

/** `accounts:lookup` succeeded but listed no user. */
export class MissingUserDataError extends AuthError {
  override name = 'MissingUserDataError';

  constructor() {
    super('The provider returned no user data for this session');
  }
}

/** A session handle was reused after an operation took ownership of it. */
export class SessionConsumedError extends AuthError {
  override name = 'SessionConsumedError';

  constructor(operation: string) {
    super(`Session was already consumed; ${operation} needs the session returned by the previous call`);
  }
}

export class ConfigError extends AuthError {
  override name = 'ConfigError';

  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
  }
}

/**
 * True only for a provider rejection of the current access credential, the one
 * failure a renewal can fix.
 */
export function isRetryEligible(error: unknown): boolean {
  return error instanceof ApiError && isCredentialInvalid(error.code);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type { HttpFailureReason };
