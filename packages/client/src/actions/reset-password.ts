import { z } from 'zod';
import {
  commonOptionsSchema,
  requiredOption,
  runAction,
  type ActionDependencies,
} from './common.js';

const resetPasswordArgsSchema = z.object({
  email: requiredOption('email'),
  locale: z.string().trim().min(1, 'Invalid --locale').optional(),
  ...commonOptionsSchema.shape,
});

type ResetPasswordArgs = z.infer<typeof resetPasswordArgsSchema>;

export function runResetPasswordAction(
  args: ResetPasswordArgs,
  dependencies: ActionDependencies = {},
): Promise<number> {
  return runAction('reset-password', args, dependencies, async (client) => {
    await client.sendPasswordResetEmail(args.email, args.locale);
    return { success: true, email: args.email };
  });
}

export { resetPasswordArgsSchema };
export type { ResetPasswordArgs };
