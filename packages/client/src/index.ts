export { AuthClient } from './session/auth-client.js';
export {
  AuthSession,
  type AuthSessionResult,
} from './session/session.js';
export {
  createCredentialPair,
  rotatedCredentialPair,
  type CredentialPair,
} from './session/credentials.js';
export {
  RETRY_LIMIT,
  callWithTokenRefresh,
  returnsSession,
  sessionOnly,
  terminal,
  withResult,
  type CallShape,
  type RetryableCall,
  type SessionResult,
  type Successor,
} from './session/retry.js';
export {
  createEndpointConfig,
  endpointConfigSchema,
  loadConfigFromEnv,
  type EndpointConfigInput,
} from './config/config.js';
export {
  DEFAULT_IDENTITY_TOOLKIT_URL,
  DEFAULT_SECURE_TOKEN_URL,
  DEFAULT_TIMEOUT,
  type EndpointConfig,
  type Timeout,
} from './config/types.js';
export {
  ApiError,
  AuthError,
  ConfigError,
  HttpError,
  MissingUserDataError,
  ResponseDecodeError,
  SessionConsumedError,
  getErrorMessage,
  isRetryEligible,
  type HttpFailureReason,
} from './errors/errors.js';
export { classifyErrorMessage, isCredentialInvalid } from './errors/error-code.js';
export {
  KNOWN_ERROR_MESSAGES,
  type ApiErrorCode,
  type ApiErrorElement,
  type ApiErrorKind,
  type ApiErrorResponse,
  type KnownErrorKind,
  type KnownErrorMessage,
} from './errors/types.js';
export { AxiosTransport } from './transport/axios-transport.js';
export {
  LOCALE_HEADER,
  type RemoteOperation,
  type ResponseSchema,
  type Transport,
  type TransportRequest,
} from './transport/types.js';
export { encodeIdpPostBody, type IdpPostBody } from './data/idp-post-body.js';
export {
  PROVIDER_IDS,
  isProviderId,
  parseProviderId,
  type ProviderId,
} from './data/provider-id.js';
export type { ProviderUserInfo, UserData } from './data/user-data.js';
export type { DeleteAttribute, ProfileUpdate } from './api/account-update.js';
