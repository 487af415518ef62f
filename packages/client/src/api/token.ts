import { z } from 'zod';
import type { Transport } from '../transport/types.js';
import { expiresInSchema, type TokenResponse } from './types.js';

const exchangeRefreshTokenResponseSchema = z
  .object({
    id_token: z.string().min(1),
    refresh_token: z.string().min(1),
    expires_in: expiresInSchema,
    token_type: z.string().optional(),
    user_id: z.string().optional(),
    project_id: z.string().optional(),
  })
  .transform(
    (response): TokenResponse => ({
      idToken: response.id_token,
      refreshToken: response.refresh_token,
      expiresIn: response.expires_in,
      localId: response.user_id,
    }),
  );

/**
 * Trades a refresh token for a new token pair at the secure token endpoint.
 * The provider may rotate the refresh token as well.
 */
export function exchangeRefreshToken(
  transport: Transport,
  refreshToken: string,
): Promise<TokenResponse> {
  return transport.send(
    {
      operation: 'token',
      body: { grant_type: 'refresh_token', refresh_token: refreshToken },
      encoding: 'form',
    },
    exchangeRefreshTokenResponseSchema,
  );
}
