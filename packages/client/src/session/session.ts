import {
  changeEmail,
  changePassword,
  linkWithEmailPassword,
  unlinkProvider,
  updateProfile,
  type ProfileUpdate,
} from '../api/account-update.js';
import { fetchProvidersForEmail } from '../api/create-auth-uri.js';
import { deleteAccount } from '../api/delete-account.js';
import { lookupAccount } from '../api/lookup.js';
import { sendEmailVerification, sendPasswordResetEmail } from '../api/oob-code.js';
import { signInWithIdp } from '../api/sign-in.js';
import { exchangeRefreshToken } from '../api/token.js';
import type { EndpointConfig } from '../config/types.js';
import type { IdpPostBody } from '../data/idp-post-body.js';
import type { ProviderId } from '../data/provider-id.js';
import type { UserData } from '../data/user-data.js';
import { MissingUserDataError, SessionConsumedError } from '../errors/errors.js';
import type { Transport } from '../transport/types.js';
import { createCredentialPair, rotatedCredentialPair, type CredentialPair } from './credentials.js';
import {
  callWithTokenRefresh,
  returnsSession,
  sessionOnly,
  terminal,
  withResult,
  type CallShape,
  type SessionResult,
} from './retry.js';

/** What every generation of a session shares; never mutated. */
type SessionContext = {
  readonly config: EndpointConfig;
  readonly transport: Transport;
};

type AuthSessionResult<T> = SessionResult<AuthSession, T>;

/**
 * A signed-in user's credentials plus the endpoint they were issued for.
 *
 * Every operation takes ownership of the handle it is called on and, unless
 * it ends the session, resolves with a new handle. A consumed handle rejects
 * further calls with {@link SessionConsumedError}, also when the operation
 * failed; keep only the handle returned by the last call.
 */
export class AuthSession {
  readonly credentials: CredentialPair;
  private readonly context: SessionContext;
  private consumed = false;

  /** Sessions are created by `AuthClient`; see its sign-in operations. */
  constructor(context: SessionContext, credentials: CredentialPair) {
    this.context = context;
    this.credentials = credentials;
  }

  get idToken(): string {
    return this.credentials.idToken;
  }

  get refreshToken(): string {
    return this.credentials.refreshToken;
  }

  get expiresIn(): number {
    return this.credentials.expiresIn;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  /** Exchanges the refresh token for a new credential pair. */
  async refresh(): Promise<AuthSession> {
    this.take('refresh');
    return this.renewCredentials();
  }

  async getUserData(): Promise<AuthSessionResult<UserData>> {
    return this.callWithRefresh('getUserData', withResult<AuthSession, UserData>(), (session) =>
      session.getUserDataOnce(),
    );
  }

  async fetchProvidersForEmail(
    email: string,
    continueUri: string,
  ): Promise<AuthSessionResult<string[]>> {
    const shape = withResult<AuthSession, string[]>();
    return this.callWithRefresh('fetchProvidersForEmail', shape, async (session) => {
      const response = await fetchProvidersForEmail(session.context.transport, email, continueUri);
      return response.allProviders;
    });
  }

  async changeEmail(newEmail: string, locale?: string): Promise<AuthSession> {
    return this.callWithRefresh('changeEmail', sessionOnly<AuthSession>(), async (session) =>
      rotatedCredentialPair(
        await changeEmail(session.context.transport, session.idToken, newEmail, locale),
      ),
    );
  }

  async changePassword(newPassword: string): Promise<AuthSession> {
    return this.callWithRefresh('changePassword', sessionOnly<AuthSession>(), async (session) =>
      rotatedCredentialPair(
        await changePassword(session.context.transport, session.idToken, newPassword),
      ),
    );
  }

  async updateProfile(update: ProfileUpdate): Promise<AuthSession> {
    return this.callWithRefresh('updateProfile', sessionOnly<AuthSession>(), async (session) =>
      rotatedCredentialPair(await updateProfile(session.context.transport, session.idToken, update)),
    );
  }

  async unlinkProvider(providers: Iterable<ProviderId>): Promise<AuthSession> {
    const deleteProvider = new Set(providers);
    const shape = sessionOnly<AuthSession>();
    return this.callWithRefresh('unlinkProvider', shape, async (session) => {
      await unlinkProvider(session.context.transport, session.idToken, deleteProvider);
      return undefined;
    });
  }

  async sendEmailVerification(locale?: string): Promise<AuthSession> {
    const shape = sessionOnly<AuthSession>();
    return this.callWithRefresh('sendEmailVerification', shape, async (session) => {
      await sendEmailVerification(session.context.transport, session.idToken, locale);
      return undefined;
    });
  }

  async sendPasswordResetEmail(email: string, locale?: string): Promise<AuthSession> {
    const shape = sessionOnly<AuthSession>();
    return this.callWithRefresh('sendPasswordResetEmail', shape, async (session) => {
      await sendPasswordResetEmail(session.context.transport, email, locale);
      return undefined;
    });
  }

  async linkWithEmailPassword(email: string, password: string): Promise<AuthSession> {
    const shape = returnsSession<AuthSession>();
    return this.callWithRefresh('linkWithEmailPassword', shape, async (session) => {
      const response = await linkWithEmailPassword(
        session.context.transport,
        session.idToken,
        email,
        password,
      );
      return new AuthSession(session.context, createCredentialPair(response));
    });
  }

  async linkWithOAuthCredential(requestUri: string, postBody: IdpPostBody): Promise<AuthSession> {
    const shape = returnsSession<AuthSession>();
    return this.callWithRefresh('linkWithOAuthCredential', shape, async (session) => {
      const response = await signInWithIdp(session.context.transport, {
        idToken: session.idToken,
        requestUri,
        postBody,
      });
      return new AuthSession(session.context, createCredentialPair(response));
    });
  }

  /** Deletes the user. The session has no successor. */
  async deleteAccount(): Promise<void> {
    return this.callWithRefresh('deleteAccount', terminal<AuthSession>(), (session) =>
      deleteAccount(session.context.transport, session.idToken),
    );
  }

  private callWithRefresh<T, R>(
    operation: string,
    shape: CallShape<AuthSession, T, R>,
    call: (session: AuthSession) => Promise<T>,
  ): Promise<R> {
    this.take(operation);
    return callWithTokenRefresh({
      operation,
      session: this,
      shape,
      call,
      renew: (session) => session.renewCredentials(),
      successor: (session, rotated) => session.successor(rotated),
    });
  }

  private async getUserDataOnce(): Promise<UserData> {
    const response = await lookupAccount(this.context.transport, this.idToken);
    const user = response.users[0];
    if (!user) {
      throw new MissingUserDataError();
    }
    return user;
  }

  private async renewCredentials(): Promise<AuthSession> {
    const response = await exchangeRefreshToken(this.context.transport, this.refreshToken);
    return new AuthSession(this.context, createCredentialPair(response));
  }

  private successor(rotated: CredentialPair = this.credentials): AuthSession {
    return new AuthSession(this.context, rotated);
  }

  private take(operation: string): void {
    if (this.consumed) {
      throw new SessionConsumedError(operation);
    }
    this.consumed = true;
  }
}

export type { AuthSessionResult, SessionContext };
