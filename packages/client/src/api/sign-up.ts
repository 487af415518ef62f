import { z } from 'zod';
import type { Transport } from '../transport/types.js';
import { tokenResponseSchema } from './types.js';

const signUpResponseSchema = tokenResponseSchema.extend({
  email: z.string().optional(),
});

type SignUpResponse = z.infer<typeof signUpResponseSchema>;

export function signUpWithEmailPassword(
  transport: Transport,
  email: string,
  password: string,
): Promise<SignUpResponse> {
  return transport.send(
    { operation: 'accounts:signUp', body: { email, password, returnSecureToken: true } },
    signUpResponseSchema,
  );
}

/** An `accounts:signUp` call without credentials creates an anonymous user. */
export function signInAnonymously(transport: Transport): Promise<SignUpResponse> {
  return transport.send(
    { operation: 'accounts:signUp', body: { returnSecureToken: true } },
    signUpResponseSchema,
  );
}

export type { SignUpResponse };
