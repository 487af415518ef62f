import { createLogger } from '@fauth/logger';
import { confirmEmailVerification, type AccountUpdateResponse } from '../api/account-update.js';
import { fetchProvidersForEmail } from '../api/create-auth-uri.js';
import { sendPasswordResetEmail } from '../api/oob-code.js';
import {
  confirmPasswordReset,
  verifyPasswordResetCode,
  type ResetPasswordResponse,
} from '../api/reset-password.js';
import { signInWithCustomToken, signInWithEmailPassword, signInWithIdp } from '../api/sign-in.js';
import { signInAnonymously, signUpWithEmailPassword } from '../api/sign-up.js';
import { exchangeRefreshToken } from '../api/token.js';
import type { TokenResponse } from '../api/types.js';
import type { EndpointConfig } from '../config/types.js';
import type { IdpPostBody } from '../data/idp-post-body.js';
import { AxiosTransport } from '../transport/axios-transport.js';
import type { Transport } from '../transport/types.js';
import { createCredentialPair } from './credentials.js';
import { AuthSession, type SessionContext } from './session.js';

const log = createLogger('AuthClient');

/**
 * Entry point to the identity provider. Operations that sign a user in
 * resolve with an {@link AuthSession}; the rest need no session.
 *
 * One client, and the transport it was built with, is shared by every
 * session it creates.
 */
export class AuthClient {
  private readonly context: SessionContext;

  constructor(config: EndpointConfig, transport: Transport = new AxiosTransport(config)) {
    this.context = { config, transport };
  }

  get config(): EndpointConfig {
    return this.context.config;
  }

  async signUpWithEmailPassword(email: string, password: string): Promise<AuthSession> {
    log.debug('Creating an email/password account');
    return this.startSession(
      await signUpWithEmailPassword(this.context.transport, email, password),
    );
  }

  async signInWithEmailPassword(email: string, password: string): Promise<AuthSession> {
    log.debug('Signing in with email/password');
    return this.startSession(
      await signInWithEmailPassword(this.context.transport, email, password),
    );
  }

  async signInAnonymously(): Promise<AuthSession> {
    log.debug('Signing in anonymously');
    return this.startSession(await signInAnonymously(this.context.transport));
  }

  /**
   * Signs in with a credential obtained from an OAuth provider.
   * `requestUri` is the redirect URI the provider sent the user back to.
   */
  async signInWithOAuthCredential(requestUri: string, postBody: IdpPostBody): Promise<AuthSession> {
    log.debug(`Signing in with ${postBody.provider}`);
    return this.startSession(
      await signInWithIdp(this.context.transport, { requestUri, postBody }),
    );
  }

  async signInWithCustomToken(token: string): Promise<AuthSession> {
    log.debug('Signing in with a custom token');
    return this.startSession(await signInWithCustomToken(this.context.transport, token));
  }

  /** Restores a session from a stored refresh token. */
  async exchangeRefreshToken(refreshToken: string): Promise<AuthSession> {
    log.debug('Restoring a session from a refresh token');
    return this.startSession(await exchangeRefreshToken(this.context.transport, refreshToken));
  }

  async fetchProvidersForEmail(email: string, continueUri: string): Promise<string[]> {
    const response = await fetchProvidersForEmail(this.context.transport, email, continueUri);
    return response.allProviders;
  }

  async sendPasswordResetEmail(email: string, locale?: string): Promise<void> {
    await sendPasswordResetEmail(this.context.transport, email, locale);
  }

  /** Resolves with the account the code was issued for, without using the code up. */
  verifyPasswordResetCode(oobCode: string): Promise<ResetPasswordResponse> {
    return verifyPasswordResetCode(this.context.transport, oobCode);
  }

  confirmPasswordReset(oobCode: string, newPassword: string): Promise<ResetPasswordResponse> {
    return confirmPasswordReset(this.context.transport, oobCode, newPassword);
  }

  confirmEmailVerification(oobCode: string): Promise<AccountUpdateResponse> {
    return confirmEmailVerification(this.context.transport, oobCode);
  }

  private startSession(response: TokenResponse): AuthSession {
    return new AuthSession(this.context, createCredentialPair(response));
  }
}
