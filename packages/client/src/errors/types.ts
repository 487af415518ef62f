/**
 * Provider messages with a fixed meaning, keyed by the message the identity
 * toolkit puts in `error.message`.
 */
const KNOWN_ERROR_MESSAGES = {
  OPERATION_NOT_ALLOWED: 'operation-not-allowed',
  TOO_MANY_ATTEMPTS_TRY_LATER: 'too-many-attempts-try-later',
  INVALID_API_KEY: 'invalid-api-key',
  INVALID_CUSTOM_TOKEN: 'invalid-custom-token',
  INVALID_ID_TOKEN: 'invalid-id-token',
  INVALID_REFRESH_TOKEN: 'invalid-refresh-token',
  INVALID_GRANT_TYPE: 'invalid-grant-type',
  INVALID_PASSWORD: 'invalid-password',
  INVALID_IDP_RESPONSE: 'invalid-idp-response',
  INVALID_EMAIL: 'invalid-email',
  INVALID_LOGIN_CREDENTIALS: 'invalid-login-credentials',
  CREDENTIAL_MISMATCH: 'credential-mismatch',
  CREDENTIAL_TOO_OLD_LOGIN_AGAIN: 'credential-too-old-login-again',
  TOKEN_EXPIRED: 'token-expired',
  USER_DISABLED: 'user-disabled',
  USER_NOT_FOUND: 'user-not-found',
  MISSING_REFRESH_TOKEN: 'missing-refresh-token',
  EMAIL_EXISTS: 'email-exists',
  EMAIL_NOT_FOUND: 'email-not-found',
  WEAK_PASSWORD: 'weak-password',
  FEDERATED_USER_ID_ALREADY_LINKED: 'federated-user-id-already-linked',
  EXPIRED_OOB_CODE: 'expired-oob-code',
  INVALID_OOB_CODE: 'invalid-oob-code',
} as const;

type KnownErrorMessage = keyof typeof KNOWN_ERROR_MESSAGES;

type KnownErrorKind = (typeof KNOWN_ERROR_MESSAGES)[KnownErrorMessage];

type ApiErrorCode =
  | { kind: KnownErrorKind }
  | { kind: 'invalid-json-payload'; message: string }
  | { kind: 'unknown'; message: string };

type ApiErrorKind = ApiErrorCode['kind'];

type ApiErrorElement = {
  domain: string;
  reason: string;
  message: string;
};

type ApiErrorResponse = {
  error: {
    code: number;
    message: string;
    errors: ApiErrorElement[];
  };
};

export type {
  ApiErrorCode,
  ApiErrorElement,
  ApiErrorKind,
  ApiErrorResponse,
  KnownErrorKind,
  KnownErrorMessage,
};
export { KNOWN_ERROR_MESSAGES };
