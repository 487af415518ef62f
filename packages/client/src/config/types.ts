type Timeout = {
  /** Bound on opening a new connection, TLS handshake included. */
  connectionTimeoutMs: number;
  /** Upper bound on a whole request/response exchange. */
  requestTimeoutMs: number;
};

type EndpointConfig = {
  apiKey: string;
  timeout: Timeout;
  identityToolkitUrl: string;
  secureTokenUrl: string;
};

const DEFAULT_TIMEOUT: Timeout = {
  connectionTimeoutMs: 10_000,
  requestTimeoutMs: 60_000,
};

const DEFAULT_IDENTITY_TOOLKIT_URL = 'https://identitytoolkit.googleapis.com/v1';
const DEFAULT_SECURE_TOKEN_URL = 'https://securetoken.googleapis.com/v1';

export type { EndpointConfig, Timeout };
export { DEFAULT_IDENTITY_TOOLKIT_URL, DEFAULT_SECURE_TOKEN_URL, DEFAULT_TIMEOUT };
