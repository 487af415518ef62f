import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { FakeTransport } from '../test-utils/fake-transport.js';
import { emailPasswordArgsSchema, runAnonymousAction, runSignInAction } from './sign-in.js';

const env = { FAUTH_API_KEY: 'test-api-key' };

describe('emailPasswordArgsSchema', () => {
  it('requires an email', () => {
    const parsed = emailPasswordArgsSchema.safeParse({ password: 'test-password' });

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe('Missing required option: --email');
  });

  it('defaults pretty to false and reads a bare flag as true', () => {
    const base = { email: 'user@example.com', password: 'test-password' };

    expect(emailPasswordArgsSchema.parse(base).pretty).toBe(false);
    expect(emailPasswordArgsSchema.parse({ ...base, pretty: 'true' }).pretty).toBe(true);
    expect(emailPasswordArgsSchema.safeParse({ ...base, pretty: 'yes' }).success).toBe(false);
  });
});

describe('sign-in actions', () => {
  let stdout: MockInstance<typeof console.log>;
  let stderr: MockInstance<typeof console.error>;

  beforeEach(() => {
    stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the credentials of the new session', async () => {
    const transport = new FakeTransport().reply('accounts:signInWithPassword', {
      data: { idToken: 'A', refreshToken: 'R1', expiresIn: '3600' },
    });

    const exitCode = await runSignInAction(
      { email: 'user@example.com', password: 'test-password', pretty: false, verbose: false },
      { env, transport },
    );

    expect(exitCode).toBe(0);
    expect(stdout).toHaveBeenCalledWith(
      '{"credentials":{"idToken":"A","refreshToken":"R1","expiresIn":3600}}',
    );
  });

  it('prints a classified failure and exits with 1', async () => {
    const transport = new FakeTransport().reply('accounts:signInWithPassword', {
      providerError: 'INVALID_LOGIN_CREDENTIALS',
    });

    const exitCode = await runSignInAction(
      { email: 'user@example.com', password: 'test-password', pretty: false, verbose: false },
      { env, transport },
    );

    expect(exitCode).toBe(1);
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith(
      '{"success":false,"error":"Identity provider rejected the request (400): INVALID_LOGIN_CREDENTIALS","errorCode":"invalid-login-credentials"}',
    );
  });

  it('fails without an API key', async () => {
    const transport = new FakeTransport();

    const exitCode = await runAnonymousAction({ pretty: false, verbose: false }, { env: {}, transport });

    expect(exitCode).toBe(1);
    expect(stderr).toHaveBeenCalledWith('{"success":false,"error":"An API key is required"}');
    expect(transport.requests).toHaveLength(0);
  });

  it('prefers --apiKey over the environment', async () => {
    const transport = new FakeTransport().reply('accounts:signUp', {
      data: { idToken: 'A', refreshToken: 'R1', expiresIn: '3600' },
    });

    const exitCode = await runAnonymousAction(
      { apiKey: 'test-api-key', pretty: false, verbose: false },
      { env: {}, transport },
    );

    expect(exitCode).toBe(0);
  });
});
