/**
 * OAuth credential handed to `accounts:signInWithIdp`, one variant per
 * supported provider.
 */
type IdpPostBody =
  | { provider: 'google.com'; idToken: string }
  | { provider: 'facebook.com'; accessToken: string }
  | { provider: 'twitter.com'; accessToken: string; oauthTokenSecret: string };

/** Encodes the credential as the form string the `postBody` field expects. */
function encodeIdpPostBody(body: IdpPostBody): string {
  const params = new URLSearchParams();

  switch (body.provider) {
    case 'google.com':
      params.set('id_token', body.idToken);
      break;
    case 'facebook.com':
      params.set('access_token', body.accessToken);
      break;
    case 'twitter.com':
      params.set('access_token', body.accessToken);
      params.set('oauth_token_secret', body.oauthTokenSecret);
      break;
  }

  params.set('providerId', body.provider);
  return params.toString();
}

export type { IdpPostBody };
export { encodeIdpPostBody };
