import { createLogger } from '@fauth/logger';
import { getErrorMessage, isRetryEligible } from '../errors/errors.js';
import type { CredentialPair } from './credentials.js';

const log = createLogger('Session');

/**
 * Renewals allowed per wrapped call. A second credential rejection after one
 * renewal goes to the caller.
 */
export const RETRY_LIMIT = 1;

type Successor<S> = (session: S, rotated?: CredentialPair) => S;

type SessionResult<S, T> = {
  session: S;
  result: T;
};

/**
 * How a wrapped call turns the session it ran on and the primitive's value
 * into what the caller gets back.
 */
type CallShape<S, T, R> = {
  readonly kind: 'with-result' | 'session-only' | 'returns-session' | 'terminal';
  complete(session: S, value: T, successor: Successor<S>): R;
};

/** Successor session plus the decoded value (get user data, fetch providers). */
export function withResult<S, T>(): CallShape<S, T, SessionResult<S, T>> {
  return {
    kind: 'with-result',
    complete: (session, result, successor) => ({ session: successor(session), result }),
  };
}

/**
 * Successor session only. The primitive may hand back a rotated pair, which
 * the successor adopts.
 */
export function sessionOnly<S>(): CallShape<S, CredentialPair | undefined, S> {
  return {
    kind: 'session-only',
    complete: (session, rotated, successor) => successor(session, rotated),
  };
}

/** The primitive already built the successor (link operations). */
export function returnsSession<S>(): CallShape<S, S, S> {
  return {
    kind: 'returns-session',
    complete: (_session, next) => next,
  };
}

/** No successor: the session ends with the call (delete account). */
export function terminal<S>(): CallShape<S, void, void> {
  return {
    kind: 'terminal',
    complete: () => undefined,
  };
}

type RetryableCall<S, T, R> = {
  /** Name used in log lines. */
  operation: string;
  session: S;
  shape: CallShape<S, T, R>;
  call: (session: S) => Promise<T>;
  /** Token exchange. Never wrapped itself; its failure ends the call. */
  renew: (session: S) => Promise<S>;
  successor: Successor<S>;
};

/**
 * Runs `call`, and when the provider rejects the access credential, renews
 * the credentials once and runs it again on the renewed session.
 *
 * Calling -> Done(success) on success
 * Calling -> Refreshing on a credential rejection with attempts left
 * Refreshing -> Calling on a successful renewal
 * Refreshing -> Done(failure) when the renewal fails
 * Calling -> Done(failure) on any other failure or with no attempts left
 */
export async function callWithTokenRefresh<S, T, R>(request: RetryableCall<S, T, R>): Promise<R> {
  const { operation, shape, call, renew, successor } = request;
  let current = request.session;
  let attempts = 0;

  for (;;) {
    let value: T;
    try {
      value = await call(current);
    } catch (error) {
      if (!isRetryEligible(error) || attempts >= RETRY_LIMIT) {
        throw error;
      }

      log.info(`${operation}: access credential rejected, renewing before retry`);
      try {
        current = await renew(current);
      } catch (renewError) {
        log.warn(`${operation}: credential renewal failed: ${getErrorMessage(renewError)}`);
        throw renewError;
      }
      attempts += 1;
      continue;
    }

    return shape.complete(current, value, successor);
  }
}

export type { CallShape, RetryableCall, SessionResult, Successor };
