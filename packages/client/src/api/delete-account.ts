import { z } from 'zod';
import type { Transport } from '../transport/types.js';

const deleteAccountResponseSchema = z.object({
  kind: z.string().optional(),
});

export async function deleteAccount(transport: Transport, idToken: string): Promise<void> {
  await transport.send({ operation: 'accounts:delete', body: { idToken } }, deleteAccountResponseSchema);
}
