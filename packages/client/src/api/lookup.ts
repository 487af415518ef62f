import { z } from 'zod';
import { userDataSchema } from '../data/user-data.js';
import type { Transport } from '../transport/types.js';

const lookupResponseSchema = z.object({
  kind: z.string().optional(),
  users: z.array(userDataSchema).default([]),
});

type LookupResponse = z.infer<typeof lookupResponseSchema>;

export function lookupAccount(transport: Transport, idToken: string): Promise<LookupResponse> {
  return transport.send({ operation: 'accounts:lookup', body: { idToken } }, lookupResponseSchema);
}

export type { LookupResponse };
