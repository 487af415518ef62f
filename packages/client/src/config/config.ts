import { z } from 'zod';
import { ConfigError } from '../errors/errors.js';
import type { EndpointConfig } from './types.js';
import {
  DEFAULT_IDENTITY_TOOLKIT_URL,
  DEFAULT_SECURE_TOKEN_URL,
  DEFAULT_TIMEOUT,
} from './types.js';

const positiveMsSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a number of milliseconds').transform(Number)])
  .pipe(z.number().int().positive());

const timeoutSchema = z
  .object({
    connectionTimeoutMs: positiveMsSchema.default(DEFAULT_TIMEOUT.connectionTimeoutMs),
    requestTimeoutMs: positiveMsSchema.default(DEFAULT_TIMEOUT.requestTimeoutMs),
  })
  .default({});

const baseUrlSchema = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

export const endpointConfigSchema = z.object({
  apiKey: z.string().trim().min(1, 'An API key is required'),
  timeout: timeoutSchema,
  identityToolkitUrl: baseUrlSchema.default(DEFAULT_IDENTITY_TOOLKIT_URL),
  secureTokenUrl: baseUrlSchema.default(DEFAULT_SECURE_TOKEN_URL),
});

type EndpointConfigInput = z.input<typeof endpointConfigSchema>;

export function createEndpointConfig(input: EndpointConfigInput): EndpointConfig {
  const parsed = endpointConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues[0]?.message ?? 'Invalid endpoint configuration',
      parsed.error.issues,
    );
  }

  return parsed.data;
}

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim().length === 0 ? undefined : value;

/**
 * Reads the endpoint configuration from `FAUTH_*` variables. The API key may
 * be overridden, e.g. by a CLI flag.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv,
  overrides: { apiKey?: string } = {},
): EndpointConfig {
  return createEndpointConfig({
    apiKey: overrides.apiKey ?? env.FAUTH_API_KEY ?? '',
    timeout: {
      connectionTimeoutMs: emptyToUndefined(env.FAUTH_CONNECTION_TIMEOUT_MS),
      requestTimeoutMs: emptyToUndefined(env.FAUTH_REQUEST_TIMEOUT_MS),
    },
    identityToolkitUrl: emptyToUndefined(env.FAUTH_IDENTITY_TOOLKIT_URL),
    secureTokenUrl: emptyToUndefined(env.FAUTH_SECURE_TOKEN_URL),
  });
}

export type { EndpointConfigInput };
