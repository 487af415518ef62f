import { z } from 'zod';
import type { Transport } from '../transport/types.js';

const resetPasswordResponseSchema = z.object({
  email: z.string().optional(),
  requestType: z.string().optional(),
});

type ResetPasswordResponse = z.infer<typeof resetPasswordResponseSchema>;

/** Checks a password reset code without consuming it. */
export function verifyPasswordResetCode(
  transport: Transport,
  oobCode: string,
): Promise<ResetPasswordResponse> {
  return transport.send(
    { operation: 'accounts:resetPassword', body: { oobCode } },
    resetPasswordResponseSchema,
  );
}

export function confirmPasswordReset(
  transport: Transport,
  oobCode: string,
  newPassword: string,
): Promise<ResetPasswordResponse> {
  return transport.send(
    { operation: 'accounts:resetPassword', body: { oobCode, newPassword } },
    resetPasswordResponseSchema,
  );
}

export type { ResetPasswordResponse };
