/**
 * Identity provider identifiers accepted by the identity toolkit.
 */
const PROVIDER_IDS = {
  password: 'password',
  apple: 'apple.com',
  appleGameCenter: 'gc.apple.com',
  facebook: 'facebook.com',
  github: 'github.com',
  google: 'google.com',
  googlePlayGames: 'playgames.google.com',
  linkedIn: 'linkedin.com',
  microsoft: 'microsoft.com',
  twitter: 'twitter.com',
  yahoo: 'yahoo.com',
} as const;

type ProviderId = (typeof PROVIDER_IDS)[keyof typeof PROVIDER_IDS];

const KNOWN_PROVIDER_IDS: ReadonlySet<string> = new Set(Object.values(PROVIDER_IDS));

function isProviderId(value: string): value is ProviderId {
  return KNOWN_PROVIDER_IDS.has(value);
}

/** Returns the provider id, or `undefined` for a provider this client does not know. */
function parseProviderId(value: string): ProviderId | undefined {
  return isProviderId(value) ? value : undefined;
}

export type { ProviderId };
export { PROVIDER_IDS, isProviderId, parseProviderId };
