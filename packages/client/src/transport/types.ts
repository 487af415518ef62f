import type { z } from 'zod';

/** Identity toolkit operations, served under `identityToolkitUrl`. */
type AccountsOperation =
  | 'accounts:signUp'
  | 'accounts:signInWithPassword'
  | 'accounts:signInWithIdp'
  | 'accounts:signInWithCustomToken'
  | 'accounts:update'
  | 'accounts:delete'
  | 'accounts:lookup'
  | 'accounts:sendOobCode'
  | 'accounts:resetPassword'
  | 'accounts:createAuthUri';

/** Secure token exchange, served under `secureTokenUrl`. */
type TokenOperation = 'token';

type RemoteOperation = AccountsOperation | TokenOperation;

type BodyEncoding = 'json' | 'form';

type TransportRequest = {
  operation: RemoteOperation;
  body: Record<string, unknown>;
  encoding?: BodyEncoding;
  /** BCP 47 language tag, e.g. `en-US`. Sent as the locale header when set. */
  locale?: string;
};

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * One request/response exchange against a named remote operation.
 *
 * Resolves with the decoded success payload. Rejects with `ApiError` for a
 * provider rejection, `HttpError` when no response arrived and
 * `ResponseDecodeError` when the body did not match `schema`.
 */
interface Transport {
  send<T>(request: TransportRequest, schema: ResponseSchema<T>): Promise<T>;
}

const LOCALE_HEADER = 'X-Firebase-Locale';

export type {
  AccountsOperation,
  BodyEncoding,
  RemoteOperation,
  ResponseSchema,
  TokenOperation,
  Transport,
  TransportRequest,
};
export { LOCALE_HEADER };
