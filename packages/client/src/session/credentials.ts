import type { OptionalTokenResponse, TokenResponse } from '../api/types.js';

/**
 * Provider-issued credentials of a signed-in user. Always built whole from one
 * response and frozen; a renewal replaces the pair, never a single field.
 */
type CredentialPair = {
  readonly idToken: string;
  readonly refreshToken: string;
  /** Lifetime of `idToken` in seconds, as declared by the provider. */
  readonly expiresIn: number;
};

export function createCredentialPair(response: TokenResponse): CredentialPair {
  return Object.freeze({
    idToken: response.idToken,
    refreshToken: response.refreshToken,
    expiresIn: response.expiresIn,
  });
}

/**
 * Returns the rotated pair when an optional-token response carries all three
 * fields, `undefined` otherwise.
 */
export function rotatedCredentialPair(response: OptionalTokenResponse): CredentialPair | undefined {
  const { idToken, refreshToken, expiresIn } = response;
  if (idToken === undefined || refreshToken === undefined || expiresIn === undefined) {
    return undefined;
  }

  return createCredentialPair({ idToken, refreshToken, expiresIn });
}

export type { CredentialPair };
