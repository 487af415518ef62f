import { z } from 'zod';
import type { Transport } from '../transport/types.js';

const createAuthUriResponseSchema = z.object({
  allProviders: z.array(z.string()).default([]),
  registered: z.boolean().optional(),
});

type CreateAuthUriResponse = z.infer<typeof createAuthUriResponseSchema>;

/** Lists the sign-in providers registered for an email address. */
export function fetchProvidersForEmail(
  transport: Transport,
  email: string,
  continueUri: string,
): Promise<CreateAuthUriResponse> {
  return transport.send(
    { operation: 'accounts:createAuthUri', body: { identifier: email, continueUri } },
    createAuthUriResponseSchema,
  );
}

export type { CreateAuthUriResponse };
