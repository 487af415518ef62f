import { createLogger, setLogLevel } from '@fauth/logger';
import { z } from 'zod';
import { loadConfigFromEnv } from '../config/config.js';
import { ApiError, getErrorMessage } from '../errors/errors.js';
import { AuthClient } from '../session/auth-client.js';
import type { Transport } from '../transport/types.js';
import { formatJson } from '../utils/json.js';

const log = createLogger('CLI');

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const flagSchema = z
  .preprocess((value) => {
    if (value === undefined) {
      return 'false';
    }

    if (typeof value === 'string') {
      return value.toLowerCase();
    }

    return value;
  }, booleanFromCliSchema)
  .default(false);

/** Options every command accepts. */
const commonOptionsSchema = z.object({
  apiKey: z.string().trim().min(1, 'Invalid --apiKey').optional(),
  pretty: flagSchema,
  verbose: flagSchema,
});

const requiredOption = (name: string) => {
  const message = `Missing required option: --${name}`;
  return z.string({ required_error: message }).trim().min(1, message);
};

type CommonOptions = z.infer<typeof commonOptionsSchema>;

/** Collaborators an action may be handed instead of the defaults. */
type ActionDependencies = {
  env?: NodeJS.ProcessEnv;
  transport?: Transport;
};

function createActionClient(options: CommonOptions, dependencies: ActionDependencies): AuthClient {
  const config = loadConfigFromEnv(dependencies.env ?? process.env, { apiKey: options.apiKey });
  return new AuthClient(config, dependencies.transport);
}

/**
 * Runs an action body, prints its result as JSON on stdout and turns any
 * failure into a JSON error on stderr plus exit code 1.
 */
async function runAction(
  name: string,
  options: CommonOptions,
  dependencies: ActionDependencies,
  body: (client: AuthClient) => Promise<unknown>,
): Promise<number> {
  if (options.verbose) {
    setLogLevel('debug');
  }

  const startTime = Date.now();
  log.info(`Starting ${name} action`);

  try {
    const client = createActionClient(options, dependencies);
    const output = await body(client);
    console.log(formatJson(output, options.pretty));
    log.info(`Execution finished in ${Date.now() - startTime}ms`);
    return 0;
  } catch (error) {
    log.error(`${name} failed:`, error);
    console.error(
      formatJson(
        {
          success: false,
          error: getErrorMessage(error),
          ...(error instanceof ApiError ? { errorCode: error.code.kind } : {}),
        },
        options.pretty,
      ),
    );
    return 1;
  }
}

export { commonOptionsSchema, requiredOption, runAction };
export type { ActionDependencies, CommonOptions };
