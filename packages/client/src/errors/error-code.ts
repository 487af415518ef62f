import type { ApiErrorCode, KnownErrorMessage } from './types.js';
import { KNOWN_ERROR_MESSAGES } from './types.js';

// Validation failures embed the offending field name, so only the prefix is stable
const INVALID_JSON_PAYLOAD_PREFIX = 'Invalid JSON payload received. Unknown name';

// e.g. "WEAK_PASSWORD : Password should be at least 6 characters"
const DETAIL_SEPARATOR = ' : ';

function isKnownErrorMessage(value: string): value is KnownErrorMessage {
  return Object.prototype.hasOwnProperty.call(KNOWN_ERROR_MESSAGES, value);
}

/**
 * Maps the provider's `error.message` to an {@link ApiErrorCode}.
 *
 * Total over every string: messages outside the table come back as
 * `{ kind: 'unknown' }` carrying the original text.
 */
export function classifyErrorMessage(message: string): ApiErrorCode {
  if (message.startsWith(INVALID_JSON_PAYLOAD_PREFIX)) {
    return { kind: 'invalid-json-payload', message };
  }

  const separatorIndex = message.indexOf(DETAIL_SEPARATOR);
  const lookupKey = separatorIndex === -1 ? message : message.slice(0, separatorIndex);

  if (isKnownErrorMessage(lookupKey)) {
    return { kind: KNOWN_ERROR_MESSAGES[lookupKey] };
  }

  return { kind: 'unknown', message };
}

/**
 * The only failure the session layer recovers from: the access credential
 * is no longer accepted but the renewal credential may still be.
 */
export function isCredentialInvalid(code: ApiErrorCode): boolean {
  return code.kind === 'invalid-id-token';
}
