import { z } from 'zod';
import type { AuthSession } from '../session/session.js';
import {
  commonOptionsSchema,
  requiredOption,
  runAction,
  type ActionDependencies,
} from './common.js';

const emailPasswordArgsSchema = z.object({
  email: requiredOption('email'),
  password: requiredOption('password'),
  ...commonOptionsSchema.shape,
});

const anonymousArgsSchema = commonOptionsSchema;

type EmailPasswordArgs = z.infer<typeof emailPasswordArgsSchema>;
type AnonymousArgs = z.infer<typeof anonymousArgsSchema>;

const describeSession = (session: AuthSession) => ({ credentials: session.credentials });

export function runSignUpAction(
  args: EmailPasswordArgs,
  dependencies: ActionDependencies = {},
): Promise<number> {
  return runAction('sign-up', args, dependencies, async (client) =>
    describeSession(await client.signUpWithEmailPassword(args.email, args.password)),
  );
}

export function runSignInAction(
  args: EmailPasswordArgs,
  dependencies: ActionDependencies = {},
): Promise<number> {
  return runAction('sign-in', args, dependencies, async (client) =>
    describeSession(await client.signInWithEmailPassword(args.email, args.password)),
  );
}

export function runAnonymousAction(
  args: AnonymousArgs,
  dependencies: ActionDependencies = {},
): Promise<number> {
  return runAction('anonymous', args, dependencies, async (client) =>
    describeSession(await client.signInAnonymously()),
  );
}

export { anonymousArgsSchema, emailPasswordArgsSchema };
export type { AnonymousArgs, EmailPasswordArgs };
