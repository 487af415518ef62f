import { z } from 'zod';

const providerUserInfoSchema = z.object({
  providerId: z.string(),
  federatedId: z.string().optional(),
  email: z.string().optional(),
  displayName: z.string().optional(),
  photoUrl: z.string().optional(),
  rawId: z.string().optional(),
  screenName: z.string().optional(),
});

/** One account record of an `accounts:lookup` response. */
const userDataSchema = z.object({
  localId: z.string(),
  email: z.string().optional(),
  emailVerified: z.boolean().optional(),
  displayName: z.string().optional(),
  providerUserInfo: z.array(providerUserInfoSchema).optional(),
  photoUrl: z.string().optional(),
  passwordHash: z.string().optional(),
  passwordUpdatedAt: z.number().optional(),
  validSince: z.string().optional(),
  disabled: z.boolean().optional(),
  lastLoginAt: z.string().optional(),
  createdAt: z.string().optional(),
  lastRefreshAt: z.string().optional(),
  customAuth: z.boolean().optional(),
});

type ProviderUserInfo = z.infer<typeof providerUserInfoSchema>;
type UserData = z.infer<typeof userDataSchema>;

export type { ProviderUserInfo, UserData };
export { providerUserInfoSchema, userDataSchema };
