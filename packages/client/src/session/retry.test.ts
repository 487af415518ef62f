import { describe, it, expect, vi } from 'vitest';
import { providerError } from '../test-utils/fake-transport.js';
import { HttpError } from '../errors/errors.js';
import type { CredentialPair } from './credentials.js';
import {
  RETRY_LIMIT,
  callWithTokenRefresh,
  returnsSession,
  sessionOnly,
  terminal,
  withResult,
} from './retry.js';

type FakeSession = {
  generation: number;
  idToken: string;
};

const initial: FakeSession = { generation: 0, idToken: 'A' };

function createHarness() {
  const renew = vi.fn(async (session: FakeSession): Promise<FakeSession> => ({
    generation: session.generation + 1,
    idToken: `renewed-${session.generation + 1}`,
  }));
  const successor = vi.fn(
    (session: FakeSession, rotated?: CredentialPair): FakeSession => ({
      generation: session.generation + 1,
      idToken: rotated?.idToken ?? session.idToken,
    }),
  );
  return { renew, successor };
}

/** Fails with each error in turn, then resolves with `value`. */
function failingThen<T>(errors: Error[], value: T) {
  const queue = [...errors];
  return vi.fn(async (_session: FakeSession): Promise<T> => {
    const error = queue.shift();
    if (error) {
      throw error;
    }
    return value;
  });
}

describe('callWithTokenRefresh', () => {
  it('allows a single renewal per call', () => {
    expect(RETRY_LIMIT).toBe(1);
  });

  it('returns the successor and result without renewing when the call succeeds', async () => {
    const { renew, successor } = createHarness();
    const call = failingThen([], 'payload');

    const outcome = await callWithTokenRefresh({
      operation: 'getUserData',
      session: initial,
      shape: withResult<FakeSession, string>(),
      call,
      renew,
      successor,
    });

    expect(outcome).toEqual({ session: { generation: 1, idToken: 'A' }, result: 'payload' });
    expect(renew).not.toHaveBeenCalled();
    expect(call).toHaveBeenCalledWith(initial);
  });

  it('renews once and retries on the renewed session after a rejected id token', async () => {
    const { renew, successor } = createHarness();
    const call = failingThen([providerError('INVALID_ID_TOKEN')], 'payload');

    const outcome = await callWithTokenRefresh({
      operation: 'getUserData',
      session: initial,
      shape: withResult<FakeSession, string>(),
      call,
      renew,
      successor,
    });

    expect(renew).toHaveBeenCalledTimes(1);
    expect(call).toHaveBeenCalledTimes(2);
    expect(call.mock.calls[1]?.[0]).toEqual({ generation: 1, idToken: 'renewed-1' });
    expect(outcome).toEqual({
      session: { generation: 2, idToken: 'renewed-1' },
      result: 'payload',
    });
  });

  it('propagates a second rejection after exactly one renewal', async () => {
    const { renew, successor } = createHarness();
    const second = providerError('INVALID_ID_TOKEN');
    const call = failingThen([providerError('INVALID_ID_TOKEN'), second], undefined);

    await expect(
      callWithTokenRefresh({
        operation: 'changePassword',
        session: initial,
        shape: sessionOnly<FakeSession>(),
        call,
        renew,
        successor,
      }),
    ).rejects.toBe(second);

    expect(renew).toHaveBeenCalledTimes(1);
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('propagates other provider failures without renewing', async () => {
    const { renew, successor } = createHarness();
    const weakPassword = providerError('WEAK_PASSWORD : Password should be at least 6 characters');
    const call = failingThen([weakPassword], undefined);

    await expect(
      callWithTokenRefresh({
        operation: 'changePassword',
        session: initial,
        shape: sessionOnly<FakeSession>(),
        call,
        renew,
        successor,
      }),
    ).rejects.toBe(weakPassword);

    expect(renew).not.toHaveBeenCalled();
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('propagates transport failures without renewing', async () => {
    const { renew, successor } = createHarness();
    const timeout = new HttpError('accounts:lookup request failed: timeout', 'timeout');
    const call = failingThen([timeout], 'payload');

    await expect(
      callWithTokenRefresh({
        operation: 'getUserData',
        session: initial,
        shape: withResult<FakeSession, string>(),
        call,
        renew,
        successor,
      }),
    ).rejects.toBe(timeout);

    expect(renew).not.toHaveBeenCalled();
  });

  it('propagates a renewal failure without retrying the call', async () => {
    const { successor } = createHarness();
    const renewalFailure = providerError('INVALID_REFRESH_TOKEN');
    const renew = vi.fn(async (_session: FakeSession): Promise<FakeSession> => {
      throw renewalFailure;
    });
    const call = failingThen([providerError('INVALID_ID_TOKEN')], 'payload');

    await expect(
      callWithTokenRefresh({
        operation: 'getUserData',
        session: initial,
        shape: withResult<FakeSession, string>(),
        call,
        renew,
        successor,
      }),
    ).rejects.toBe(renewalFailure);

    expect(renew).toHaveBeenCalledTimes(1);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('adopts a rotated pair handed back by a session-only call', async () => {
    const { renew, successor } = createHarness();
    const rotated: CredentialPair = { idToken: 'C', refreshToken: 'R3', expiresIn: 3600 };
    const call = failingThen([], rotated);

    const next = await callWithTokenRefresh({
      operation: 'changeEmail',
      session: initial,
      shape: sessionOnly<FakeSession>(),
      call,
      renew,
      successor,
    });

    expect(next).toEqual({ generation: 1, idToken: 'C' });
    expect(successor).toHaveBeenCalledWith(initial, rotated);
  });

  it('returns the session a link call built, without calling successor', async () => {
    const { renew, successor } = createHarness();
    const linked: FakeSession = { generation: 42, idToken: 'linked' };
    const call = failingThen([providerError('INVALID_ID_TOKEN')], linked);

    const next = await callWithTokenRefresh({
      operation: 'linkWithEmailPassword',
      session: initial,
      shape: returnsSession<FakeSession>(),
      call,
      renew,
      successor,
    });

    expect(next).toBe(linked);
    expect(successor).not.toHaveBeenCalled();
    expect(renew).toHaveBeenCalledTimes(1);
  });

  it('resolves with nothing for a terminal call', async () => {
    const { renew, successor } = createHarness();
    const call = failingThen([providerError('INVALID_ID_TOKEN')], undefined);

    const outcome = await callWithTokenRefresh({
      operation: 'deleteAccount',
      session: initial,
      shape: terminal<FakeSession>(),
      call,
      renew,
      successor,
    });

    expect(outcome).toBeUndefined();
    expect(successor).not.toHaveBeenCalled();
    expect(call.mock.calls[1]?.[0]).toEqual({ generation: 1, idToken: 'renewed-1' });
  });
});
