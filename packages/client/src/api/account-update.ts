import { z } from 'zod';
import { providerUserInfoSchema } from '../data/user-data.js';
import type { ProviderId } from '../data/provider-id.js';
import type { Transport } from '../transport/types.js';
import { optionalTokenResponseSchema, tokenResponseSchema, type Locale } from './types.js';

/** Every `accounts:update` variant answers with (part of) the account record. */
const accountUpdateResponseSchema = optionalTokenResponseSchema.extend({
  localId: z.string().optional(),
  email: z.string().optional(),
  displayName: z.string().optional(),
  photoUrl: z.string().optional(),
  passwordHash: z.string().optional(),
  providerUserInfo: z.array(providerUserInfoSchema).optional(),
  emailVerified: z.boolean().optional(),
});

const linkWithEmailPasswordResponseSchema = accountUpdateResponseSchema.merge(tokenResponseSchema);

type AccountUpdateResponse = z.infer<typeof accountUpdateResponseSchema>;
type LinkWithEmailPasswordResponse = z.infer<typeof linkWithEmailPasswordResponseSchema>;

type DeleteAttribute = 'DISPLAY_NAME' | 'PHOTO_URL';

type ProfileUpdate = {
  displayName?: string;
  photoUrl?: string;
  deleteAttribute?: readonly DeleteAttribute[];
};

/**
 * The provider revokes outstanding tokens when the email or password changes,
 * so both ask for a replacement pair.
 */
export function changeEmail(
  transport: Transport,
  idToken: string,
  email: string,
  locale: Locale,
): Promise<AccountUpdateResponse> {
  return transport.send(
    {
      operation: 'accounts:update',
      body: { idToken, email, returnSecureToken: true },
      locale,
    },
    accountUpdateResponseSchema,
  );
}

export function changePassword(
  transport: Transport,
  idToken: string,
  password: string,
): Promise<AccountUpdateResponse> {
  return transport.send(
    { operation: 'accounts:update', body: { idToken, password, returnSecureToken: true } },
    accountUpdateResponseSchema,
  );
}

export function updateProfile(
  transport: Transport,
  idToken: string,
  update: ProfileUpdate,
): Promise<AccountUpdateResponse> {
  return transport.send(
    {
      operation: 'accounts:update',
      body: {
        idToken,
        ...(update.displayName === undefined ? {} : { displayName: update.displayName }),
        ...(update.photoUrl === undefined ? {} : { photoUrl: update.photoUrl }),
        deleteAttribute: [...(update.deleteAttribute ?? [])],
        returnSecureToken: false,
      },
    },
    accountUpdateResponseSchema,
  );
}

export function linkWithEmailPassword(
  transport: Transport,
  idToken: string,
  email: string,
  password: string,
): Promise<LinkWithEmailPasswordResponse> {
  return transport.send(
    {
      operation: 'accounts:update',
      body: { idToken, email, password, returnSecureToken: true },
    },
    linkWithEmailPasswordResponseSchema,
  );
}

export function unlinkProvider(
  transport: Transport,
  idToken: string,
  providers: ReadonlySet<ProviderId>,
): Promise<AccountUpdateResponse> {
  return transport.send(
    { operation: 'accounts:update', body: { idToken, deleteProvider: [...providers] } },
    accountUpdateResponseSchema,
  );
}

/** Applies the out-of-band code from a verification email. */
export function confirmEmailVerification(
  transport: Transport,
  oobCode: string,
): Promise<AccountUpdateResponse> {
  return transport.send(
    { operation: 'accounts:update', body: { oobCode } },
    accountUpdateResponseSchema,
  );
}

export type {
  AccountUpdateResponse,
  DeleteAttribute,
  LinkWithEmailPasswordResponse,
  ProfileUpdate,
};
