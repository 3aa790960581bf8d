import { describe, it, expect } from 'vitest';
import { AuthSessionManager, HttpAuthExchange } from '../src/core/api/session.js';
import type { Credential } from '../src/core/api/session.js';
import { AuthenticationError } from '../src/core/api/errors.js';
import { BASE_URL, deferred, fakeExchange, fetchMock, jsonResponse, requestBody, textResponse } from './helpers.js';

const MINUTE = 60_000;

function setup() {
  const clock = { now: 0 };
  const now = () => clock.now;
  const exchange = fakeExchange(now);
  const session = new AuthSessionManager(exchange, { now });
  return { clock, exchange, session };
}

describe('AuthSessionManager', () => {
  it('logs in on first use', async () => {
    const { exchange, session } = setup();
    expect(session.state).toBe('unauthenticated');
    const cred = await session.getCredential();
    expect(cred.token).toBe('tok-1');
    expect(exchange.login).toHaveBeenCalledTimes(1);
    expect(session.state).toBe('authenticated');
  });

  it('reuses a fresh credential', async () => {
    const { exchange, session } = setup();
    const a = await session.getCredential();
    const b = await session.getCredential();
    expect(b.token).toBe(a.token);
    expect(exchange.login).toHaveBeenCalledTimes(1);
    expect(exchange.refresh).not.toHaveBeenCalled();
  });

  it('refreshes once the safety margin is reached', async () => {
    const { clock, exchange, session } = setup();
    await session.getCredential();
    clock.now = 14 * MINUTE;
    const cred = await session.getCredential();
    expect(exchange.refresh).toHaveBeenCalledTimes(1);
    expect(cred.token).toBe('tok-2');
  });

  it('does not refresh just before the margin', async () => {
    const { clock, exchange, session } = setup();
    await session.getCredential();
    clock.now = 14 * MINUTE - 1;
    await session.getCredential();
    expect(exchange.refresh).not.toHaveBeenCalled();
  });

  it('falls back to login when refresh fails', async () => {
    const { clock, exchange, session } = setup();
    await session.getCredential();
    exchange.refresh.mockRejectedValueOnce(new Error('refresh rejected'));
    clock.now = 20 * MINUTE;
    const cred = await session.getCredential();
    expect(exchange.login).toHaveBeenCalledTimes(2);
    expect(cred.token).toBe('tok-2');
  });

  it('runs one refresh for concurrent callers', async () => {
    const { clock, exchange, session } = setup();
    await session.getCredential();
    const gate = deferred<Credential>();
    exchange.refresh.mockReturnValueOnce(gate.promise);
    clock.now = 15 * MINUTE;

    const callers = Array.from({ length: 5 }, () => session.getCredential());
    gate.resolve({ token: 'tok-shared', expiresAt: 30 * MINUTE });
    const creds = await Promise.all(callers);

    expect(exchange.refresh).toHaveBeenCalledTimes(1);
    expect(creds.map((c) => c.token)).toEqual(Array(5).fill('tok-shared'));
  });

  it('runs one login for concurrent first callers', async () => {
    const { exchange, session } = setup();
    const creds = await Promise.all([session.getCredential(), session.getCredential(), session.getCredential()]);
    expect(exchange.login).toHaveBeenCalledTimes(1);
    expect(new Set(creds.map((c) => c.token))).toEqual(new Set(['tok-1']));
  });

  it('forces a login, not a refresh, on the reactive path', async () => {
    const { exchange, session } = setup();
    const first = await session.getCredential();
    const fresh = await session.forceReauthenticate(first.token);
    expect(fresh.token).toBe('tok-2');
    expect(exchange.login).toHaveBeenCalledTimes(2);
    expect(exchange.refresh).not.toHaveBeenCalled();
  });

  it('reuses a credential that already replaced the stale token', async () => {
    const { exchange, session } = setup();
    await session.getCredential();
    const replaced = await session.forceReauthenticate('tok-1');
    const again = await session.forceReauthenticate('tok-1');
    expect(again.token).toBe(replaced.token);
    expect(exchange.login).toHaveBeenCalledTimes(2);
  });

  it('surfaces login failure as AuthenticationError and retries on the next request', async () => {
    const { exchange, session } = setup();
    exchange.login.mockRejectedValueOnce(new Error('socket hang up'));
    await expect(session.getCredential()).rejects.toThrow(AuthenticationError);
    expect(session.state).toBe('unauthenticated');
    await expect(session.getCredential()).resolves.toMatchObject({ token: 'tok-1' });
  });

  it('logs out and clears state', async () => {
    const { exchange, session } = setup();
    await session.getCredential();
    await session.logout();
    expect(exchange.logout).toHaveBeenCalledWith(expect.objectContaining({ token: 'tok-1' }));
    expect(session.state).toBe('unauthenticated');
  });

  it('clears state even when logout fails', async () => {
    const { exchange, session } = setup();
    await session.getCredential();
    exchange.logout.mockRejectedValueOnce(new Error('gone'));
    await expect(session.logout()).resolves.toBeUndefined();
    expect(session.state).toBe('unauthenticated');
  });

  it('skips the logout call without a credential', async () => {
    const { exchange, session } = setup();
    await session.logout();
    expect(exchange.logout).not.toHaveBeenCalled();
  });
});

describe('HttpAuthExchange', () => {
  const seed = { username: 'test-user', password: 'test-secret', kb: 'Demo', language: 'en' };

  it('posts the login seed and computes the expiry', async () => {
    const fetch = fetchMock();
    fetch.mockResolvedValueOnce(jsonResponse({
      success: true,
      result: { access_token: 'tok-a', refresh_token: 'ref-a', expires_in: 10 },
    }));
    const exchange = new HttpAuthExchange({ baseUrl: `${BASE_URL}/`, seed, timeoutMs: 1000, fetch, now: () => 5000 });

    const cred = await exchange.login();

    expect(cred).toEqual({ token: 'tok-a', expiresAt: 5000 + 10 * MINUTE });
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/login`);
    expect(init?.method).toBe('POST');
    expect(requestBody(init)).toEqual({ login: 'test-user', password: 'test-secret', KB: 'Demo', lang: 'en' });
  });

  it('defaults the token lifetime to 15 minutes', async () => {
    const fetch = fetchMock();
    fetch.mockResolvedValueOnce(jsonResponse({ success: true, result: { access_token: 'tok-a' } }));
    const exchange = new HttpAuthExchange({ baseUrl: BASE_URL, seed, timeoutMs: 1000, fetch, now: () => 0 });
    await expect(exchange.login()).resolves.toMatchObject({ expiresAt: 15 * MINUTE });
  });

  it('fails on an embedded failure flag', async () => {
    const fetch = fetchMock();
    fetch.mockResolvedValueOnce(jsonResponse({ success: false, message: 'Invalid credentials' }));
    const exchange = new HttpAuthExchange({ baseUrl: BASE_URL, seed, timeoutMs: 1000, fetch });
    await expect(exchange.login()).rejects.toThrow('Authentication failed: Invalid credentials');
  });

  it('fails on an HTTP error', async () => {
    const fetch = fetchMock();
    fetch.mockResolvedValueOnce(textResponse('boom', 500));
    const exchange = new HttpAuthExchange({ baseUrl: BASE_URL, seed, timeoutMs: 1000, fetch });
    await expect(exchange.login()).rejects.toThrow('Authentication failed: 500 - boom');
  });

  it('sends the bearer token on logout', async () => {
    const fetch = fetchMock();
    fetch.mockResolvedValueOnce(jsonResponse({ success: true }));
    const exchange = new HttpAuthExchange({ baseUrl: BASE_URL, seed, timeoutMs: 1000, fetch });
    await exchange.logout({ token: 'tok-z', expiresAt: 0 });
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/logout`);
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer tok-z');
  });
});
