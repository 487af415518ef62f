import { z } from 'zod';
import {
  commonOptionsSchema,
  requiredOption,
  runAction,
  type ActionDependencies,
} from './common.js';

const userArgsSchema = z.object({
  refreshToken: requiredOption('refreshToken'),
  ...commonOptionsSchema.shape,
});

type UserArgs = z.infer<typeof userArgsSchema>;

/**
 * Restores a session from a refresh token and prints the account record.
 * The printed credentials are the ones to keep; the provider may have
 * rotated them.
 */
export function runUserAction(
  args: UserArgs,
  dependencies: ActionDependencies = {},
): Promise<number> {
  return runAction('user', args, dependencies, async (client) => {
    const session = await client.exchangeRefreshToken(args.refreshToken);
    const { session: next, result } = await session.getUserData();
    return { user: result, credentials: next.credentials };
  });
}

export { userArgsSchema };
export type { UserArgs };
