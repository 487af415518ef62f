import { describe, it, expect } from 'vitest';
import { classifyErrorMessage, isCredentialInvalid } from './error-code.js';
import { ApiError, HttpError, isRetryEligible } from './errors.js';
import { KNOWN_ERROR_MESSAGES } from './types.js';

describe('classifyErrorMessage', () => {
  it.each(Object.entries(KNOWN_ERROR_MESSAGES))('maps %s to %s', (message, kind) => {
    expect(classifyErrorMessage(message)).toEqual({ kind });
  });

  it('ignores the detail the provider appends after the code', () => {
    expect(classifyErrorMessage('WEAK_PASSWORD : Password should be at least 6 characters')).toEqual({
      kind: 'weak-password',
    });
    expect(classifyErrorMessage('TOO_MANY_ATTEMPTS_TRY_LATER : Try again later.')).toEqual({
      kind: 'too-many-attempts-try-later',
    });
  });

  it('keeps the text of a payload validation message', () => {
    const message =
      'Invalid JSON payload received. Unknown name "emial": Cannot find field.';

    expect(classifyErrorMessage(message)).toEqual({ kind: 'invalid-json-payload', message });
  });

  it('preserves an unrecognised message verbatim', () => {
    expect(classifyErrorMessage('QUOTA_EXCEEDED')).toEqual({
      kind: 'unknown',
      message: 'QUOTA_EXCEEDED',
    });
    expect(classifyErrorMessage('')).toEqual({ kind: 'unknown', message: '' });
  });

  it('does not match inherited object keys', () => {
    expect(classifyErrorMessage('toString')).toEqual({ kind: 'unknown', message: 'toString' });
  });

  it('matches case-sensitively', () => {
    expect(classifyErrorMessage('invalid_id_token').kind).toBe('unknown');
  });
});

describe('isCredentialInvalid', () => {
  it('is true only for a rejected id token', () => {
    const eligible = Object.values(KNOWN_ERROR_MESSAGES).filter((kind) =>
      isCredentialInvalid({ kind }),
    );

    expect(eligible).toEqual(['invalid-id-token']);
    expect(isCredentialInvalid({ kind: 'unknown', message: 'INVALID_ID_TOKEN!' })).toBe(false);
  });
});

describe('isRetryEligible', () => {
  const envelope = (message: string) => ({ error: { code: 400, message, errors: [] } });

  it('accepts an ApiError for a rejected id token', () => {
    const error = new ApiError(400, { kind: 'invalid-id-token' }, envelope('INVALID_ID_TOKEN'));
    expect(isRetryEligible(error)).toBe(true);
  });

  it('rejects other provider failures and transport failures', () => {
    expect(
      isRetryEligible(new ApiError(400, { kind: 'token-expired' }, envelope('TOKEN_EXPIRED'))),
    ).toBe(false);
    expect(isRetryEligible(new HttpError('accounts:lookup request failed: timeout', 'timeout'))).toBe(
      false,
    );
    expect(isRetryEligible(new Error('INVALID_ID_TOKEN'))).toBe(false);
  });
});
