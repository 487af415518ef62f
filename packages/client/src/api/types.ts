import { z } from 'zod';

// The provider sends token lifetimes as decimal strings, e.g. "3600"
const expiresInSchema = z
  .string()
  .regex(/^\d+$/, 'expiresIn must be a whole number of seconds')
  .transform(Number);

/** Token fields of every identity toolkit response that signs a user in. */
const tokenResponseSchema = z.object({
  idToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresIn: expiresInSchema,
  localId: z.string().optional(),
});

/**
 * `accounts:update` only returns tokens when asked to; when it does, all
 * three fields are present.
 */
const optionalTokenResponseSchema = z.object({
  idToken: z.string().min(1).optional(),
  refreshToken: z.string().min(1).optional(),
  expiresIn: expiresInSchema.optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;
type OptionalTokenResponse = z.infer<typeof optionalTokenResponseSchema>;

type Locale = string | undefined;

export type { Locale, OptionalTokenResponse, TokenResponse };
export { expiresInSchema, optionalTokenResponseSchema, tokenResponseSchema };
