import { z } from 'zod';
import {
  commonOptionsSchema,
  requiredOption,
  runAction,
  type ActionDependencies,
} from './common.js';

const DEFAULT_CONTINUE_URI = 'http://localhost';

const providersArgsSchema = z.object({
  email: requiredOption('email'),
  continueUri: z.string().trim().url('Invalid --continueUri').default(DEFAULT_CONTINUE_URI),
  ...commonOptionsSchema.shape,
});

type ProvidersArgs = z.infer<typeof providersArgsSchema>;

export function runProvidersAction(
  args: ProvidersArgs,
  dependencies: ActionDependencies = {},
): Promise<number> {
  return runAction('providers', args, dependencies, async (client) => ({
    email: args.email,
    providers: await client.fetchProvidersForEmail(args.email, args.continueUri),
  }));
}

export { providersArgsSchema };
export type { ProvidersArgs };
