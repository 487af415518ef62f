#!/usr/bin/env node
import { z } from 'zod';
import { providersArgsSchema, runProvidersAction } from './actions/providers.js';
import { resetPasswordArgsSchema, runResetPasswordAction } from './actions/reset-password.js';
import {
  anonymousArgsSchema,
  emailPasswordArgsSchema,
  runAnonymousAction,
  runSignInAction,
  runSignUpAction,
} from './actions/sign-in.js';
import { runUserAction, userArgsSchema } from './actions/user.js';
import { parseArgs } from './utils/args.js';

const optionsSchema = z.record(z.string(), z.string());

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('help'), options: optionsSchema }),
  z.object({ command: z.literal('sign-up'), options: optionsSchema }),
  z.object({ command: z.literal('sign-in'), options: optionsSchema }),
  z.object({ command: z.literal('anonymous'), options: optionsSchema }),
  z.object({ command: z.literal('user'), options: optionsSchema }),
  z.object({ command: z.literal('providers'), options: optionsSchema }),
  z.object({ command: z.literal('reset-password'), options: optionsSchema }),
]);

function printHelp(): void {
  console.log(`fauth CLI

Usage:
  fauth help
  fauth sign-up --email=user@example.com --password=<password>
  fauth sign-in --email=user@example.com --password=<password> --pretty
  fauth anonymous
  fauth user --refreshToken=<refresh token>
  fauth providers --email=user@example.com
  fauth providers --email=user@example.com --continueUri=https://example.com
  fauth reset-password --email=user@example.com --locale=fr

Commands:
  help            Show this help message
  sign-up         Create an email/password account and print its credentials
  sign-in         Sign in with email/password and print the credentials
  anonymous       Create an anonymous user and print its credentials
  user            Restore a session from a refresh token and print the account
  providers       List the sign-in providers registered for an email address
  reset-password  Send a password reset email

Options:
  --apiKey        Web API key of the project. Defaults to FAUTH_API_KEY.
  --pretty        Pretty-print JSON output.
  --verbose       Log every request to stderr (same as LOG_LEVEL=debug).
  --continueUri   Optional for providers (default: http://localhost).
  --locale        Optional for reset-password. Language of the email, e.g. en-US.

Environment:
  FAUTH_API_KEY, FAUTH_CONNECTION_TIMEOUT_MS, FAUTH_REQUEST_TIMEOUT_MS,
  FAUTH_IDENTITY_TOOLKIT_URL, FAUTH_SECURE_TOKEN_URL, LOG_LEVEL
`);
}

function reportInvalidArgs(error: z.ZodError): number {
  console.error(error.issues[0]?.message ?? 'Invalid arguments');
  printHelp();
  return 1;
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  const input = parsedCliInput.data;

  switch (input.command) {
    case 'help':
      printHelp();
      return 0;

    case 'sign-up':
    case 'sign-in': {
      const parsedArgs = emailPasswordArgsSchema.safeParse(input.options);
      if (!parsedArgs.success) {
        return reportInvalidArgs(parsedArgs.error);
      }
      return input.command === 'sign-up'
        ? runSignUpAction(parsedArgs.data)
        : runSignInAction(parsedArgs.data);
    }

    case 'anonymous': {
      const parsedArgs = anonymousArgsSchema.safeParse(input.options);
      if (!parsedArgs.success) {
        return reportInvalidArgs(parsedArgs.error);
      }
      return runAnonymousAction(parsedArgs.data);
    }

    case 'user': {
      const parsedArgs = userArgsSchema.safeParse(input.options);
      if (!parsedArgs.success) {
        return reportInvalidArgs(parsedArgs.error);
      }
      return runUserAction(parsedArgs.data);
    }

    case 'providers': {
      const parsedArgs = providersArgsSchema.safeParse(input.options);
      if (!parsedArgs.success) {
        return reportInvalidArgs(parsedArgs.error);
      }
      return runProvidersAction(parsedArgs.data);
    }

    case 'reset-password': {
      const parsedArgs = resetPasswordArgsSchema.safeParse(input.options);
      if (!parsedArgs.success) {
        return reportInvalidArgs(parsedArgs.error);
      }
      return runResetPasswordAction(parsedArgs.data);
    }
  }
}

const exitCode = await main();
process.exitCode = exitCode;
