import { z } from 'zod';
import type { Transport } from '../transport/types.js';
import type { Locale } from './types.js';

const sendOobCodeResponseSchema = z.object({
  email: z.string().optional(),
});

type SendOobCodeResponse = z.infer<typeof sendOobCodeResponseSchema>;

export function sendPasswordResetEmail(
  transport: Transport,
  email: string,
  locale: Locale,
): Promise<SendOobCodeResponse> {
  return transport.send(
    {
      operation: 'accounts:sendOobCode',
      body: { requestType: 'PASSWORD_RESET', email },
      locale,
    },
    sendOobCodeResponseSchema,
  );
}

export function sendEmailVerification(
  transport: Transport,
  idToken: string,
  locale: Locale,
): Promise<SendOobCodeResponse> {
  return transport.send(
    {
      operation: 'accounts:sendOobCode',
      body: { requestType: 'VERIFY_EMAIL', idToken },
      locale,
    },
    sendOobCodeResponseSchema,
  );
}

export type { SendOobCodeResponse };
