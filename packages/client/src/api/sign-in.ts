import { z } from 'zod';
import { encodeIdpPostBody, type IdpPostBody } from '../data/idp-post-body.js';
import type { Transport } from '../transport/types.js';
import { tokenResponseSchema } from './types.js';

const signInWithPasswordResponseSchema = tokenResponseSchema.extend({
  email: z.string().optional(),
  displayName: z.string().optional(),
  registered: z.boolean().optional(),
});

/** Shared by sign-in and link through `accounts:signInWithIdp`. */
const idpResponseSchema = tokenResponseSchema.extend({
  federatedId: z.string().optional(),
  providerId: z.string().optional(),
  email: z.string().optional(),
  emailVerified: z.boolean().optional(),
  oauthIdToken: z.string().optional(),
  oauthAccessToken: z.string().optional(),
  oauthTokenSecret: z.string().optional(),
  rawUserInfo: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  fullName: z.string().optional(),
  displayName: z.string().optional(),
  photoUrl: z.string().optional(),
  needConfirmation: z.boolean().optional(),
});

type SignInWithPasswordResponse = z.infer<typeof signInWithPasswordResponseSchema>;
type IdpResponse = z.infer<typeof idpResponseSchema>;

export function signInWithEmailPassword(
  transport: Transport,
  email: string,
  password: string,
): Promise<SignInWithPasswordResponse> {
  return transport.send(
    {
      operation: 'accounts:signInWithPassword',
      body: { email, password, returnSecureToken: true },
    },
    signInWithPasswordResponseSchema,
  );
}

export function signInWithCustomToken(
  transport: Transport,
  token: string,
): Promise<z.infer<typeof tokenResponseSchema>> {
  return transport.send(
    { operation: 'accounts:signInWithCustomToken', body: { token, returnSecureToken: true } },
    tokenResponseSchema,
  );
}

type IdpRequest = {
  requestUri: string;
  postBody: IdpPostBody;
  /** Present when linking the credential to an existing account. */
  idToken?: string;
};

export function signInWithIdp(transport: Transport, request: IdpRequest): Promise<IdpResponse> {
  return transport.send(
    {
      operation: 'accounts:signInWithIdp',
      body: {
        ...(request.idToken === undefined ? {} : { idToken: request.idToken }),
        requestUri: request.requestUri,
        postBody: encodeIdpPostBody(request.postBody),
        returnSecureToken: true,
        returnIdpCredential: false,
      },
    },
    idpResponseSchema,
  );
}

export type { IdpRequest, IdpResponse, SignInWithPasswordResponse };
