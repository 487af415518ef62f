import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { FakeTransport } from '../test-utils/fake-transport.js';
import { providersArgsSchema, runProvidersAction } from './providers.js';
import { runResetPasswordAction } from './reset-password.js';
import { runUserAction } from './user.js';

const env = { FAUTH_API_KEY: 'test-api-key' };

describe('account actions', () => {
  let stdout: MockInstance<typeof console.log>;

  beforeEach(() => {
    stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('restores a session and prints the user with the current credentials', async () => {
    const transport = new FakeTransport()
      .reply('token', { data: { id_token: 'B', refresh_token: 'R2', expires_in: '3600' } })
      .reply('accounts:lookup', { data: { users: [{ localId: 'user-1' }] } });

    const exitCode = await runUserAction({ refreshToken: 'R1', pretty: false, verbose: false }, { env, transport });

    expect(exitCode).toBe(0);
    expect(stdout).toHaveBeenCalledWith(
      '{"user":{"localId":"user-1"},"credentials":{"idToken":"B","refreshToken":"R2","expiresIn":3600}}',
    );
    expect(transport.requestsFor('accounts:lookup')[0]?.body).toEqual({ idToken: 'B' });
  });

  it('lists providers with the default continue URI', async () => {
    const transport = new FakeTransport().reply('accounts:createAuthUri', {
      data: { allProviders: ['password', 'google.com'] },
    });
    const args = providersArgsSchema.parse({ email: 'user@example.com' });

    const exitCode = await runProvidersAction(args, { env, transport });

    expect(exitCode).toBe(0);
    expect(transport.requests[0]?.body).toEqual({
      identifier: 'user@example.com',
      continueUri: 'http://localhost',
    });
    expect(stdout).toHaveBeenCalledWith(
      '{"email":"user@example.com","providers":["password","google.com"]}',
    );
  });

  it('sends a reset email with the requested locale', async () => {
    const transport = new FakeTransport().reply('accounts:sendOobCode', {
      data: { email: 'user@example.com' },
    });

    const exitCode = await runResetPasswordAction(
      { email: 'user@example.com', locale: 'es', pretty: true, verbose: false },
      { env, transport },
    );

    expect(exitCode).toBe(0);
    expect(transport.requests[0]?.locale).toBe('es');
    expect(stdout).toHaveBeenCalledWith('{\n  "success": true,\n  "email": "user@example.com"\n}');
  });

  it('exits with 1 when the address is unknown', async () => {
    const transport = new FakeTransport().reply('accounts:sendOobCode', {
      providerError: 'EMAIL_NOT_FOUND',
    });

    const exitCode = await runResetPasswordAction(
      { email: 'user@example.com', pretty: false, verbose: false },
      { env, transport },
    );

    expect(exitCode).toBe(1);
    expect(stdout).not.toHaveBeenCalled();
  });
});
