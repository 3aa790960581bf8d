/**
 * Authenticated session lifecycle.
 *
 *   unauthenticated ──login──▶ authenticated ──(401)──▶ expired ──login──▶ authenticated
 *                                    │
 *                                    └─ past expiry − margin: refresh (login on refresh failure)
 *
 * Passive: acts only when a credential is requested. At most one login/refresh
 * exchange is in flight; concurrent callers await the same promise.
 */
import { z } from 'zod';
import { AuthenticationError, isAgiloftError } from './errors.js';
import type { LoginResult } from './types.js';
import { log as rootLog } from '../../serve/logger.js';
import type { Logger } from '../../serve/logger.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface Credential {
  token: string;
  /** Absolute expiry, epoch ms. */
  expiresAt: number;
}

export type SessionState = 'unauthenticated' | 'authenticated' | 'expired';

/** The login/refresh/logout exchanges the session manager drives. */
export interface AuthExchange {
  login(): Promise<Credential>;
  refresh(current: Credential): Promise<Credential>;
  logout(current: Credential): Promise<void>;
}

export interface LoginSeed {
  username: string;
  password: string;
  kb: string;
  language: string;
}

/** Token lifetime when the login response omits `expires_in`. */
export const DEFAULT_TOKEN_MINUTES = 15;
export const DEFAULT_SAFETY_MARGIN_MS = 60_000;

// ── HTTP exchange ────────────────────────────────────────────────

const loginResponseSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  result: z
    .object({
      access_token: z.string().min(1),
      expires_in: z.number().positive().optional(),
    })
    .optional(),
});

export interface HttpAuthExchangeOptions {
  baseUrl: string;
  seed: LoginSeed;
  timeoutMs: number;
  fetch?: FetchLike;
  now?: () => number;
}

/**
 * Login exchange against `{base}/login`. The backend exposes no separate refresh
 * grant, so refresh re-runs the same exchange.
 */
export class HttpAuthExchange implements AuthExchange {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(private readonly options: HttpAuthExchangeOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async login(): Promise<Credential> {
    const { seed } = this.options;
    const body = await this.post('/login', {
      login: seed.username,
      password: seed.password,
      KB: seed.kb,
      lang: seed.language,
    });

    const parsed = loginResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError('Authentication failed: unexpected login response');
    }
    const { success, message, result } = parsed.data;
    if (success === false || !result) {
      throw new AuthenticationError(`Authentication failed: ${message ?? 'Unknown error'}`, {
        backendMessage: message,
      });
    }
    return this.toCredential(result);
  }

  async refresh(): Promise<Credential> {
    return this.login();
  }

  async logout(current: Credential): Promise<void> {
    await this.post('/logout', undefined, current.token);
  }

  private toCredential(result: LoginResult): Credential {
    const minutes = result.expires_in ?? DEFAULT_TOKEN_MINUTES;
    return {
      token: result.access_token,
      expiresAt: this.now() + minutes * 60_000,
    };
  }

  private async post(path: string, payload: unknown, token?: string): Promise<unknown> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json', Accept: 'application/json' };
    if (token) headers.Authorization = `Bearer ${token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new AuthenticationError(`Authentication endpoint timed out after ${this.options.timeoutMs}ms`);
      }
      throw new AuthenticationError(`Authentication endpoint unreachable: ${err instanceof Error ? err.message : String(err)}`);
    }

    const text = await res.text();
    if (!res.ok) {
      throw new AuthenticationError(`Authentication failed: ${res.status} - ${text}`, { status: res.status });
    }
    try {
      return text ? JSON.parse(text) : {};
    } catch {
      throw new AuthenticationError(`Authentication failed: response is not JSON (${res.status})`, { status: res.status });
    }
  }
}

// ── Session manager ──────────────────────────────────────────────

export interface SessionOptions {
  safetyMarginMs?: number;
  now?: () => number;
  logger?: Logger;
}

export class AuthSessionManager {
  private credential: Credential | null = null;
  private inflight: Promise<Credential> | null = null;
  private current: SessionState = 'unauthenticated';
  private readonly safetyMarginMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly exchange: AuthExchange,
    options: SessionOptions = {},
  ) {
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLog).child({ component: 'session' });
  }

  get state(): SessionState {
    return this.current;
  }

  /**
   * A credential valid for at least the safety margin. Logs in on first use and
   * refreshes once the margin is reached.
   */
  async getCredential(): Promise<Credential> {
    if (this.inflight) return this.inflight;
    const cred = this.credential;
    if (cred && this.isFresh(cred)) return cred;
    return this.singleFlight(cred ? () => this.refreshOrLogin(cred) : () => this.exchange.login());
  }

  /**
   * Reactive path after an authorization failure: drop the cached credential and
   * log in again. When another caller already replaced `staleToken`, its result
   * is reused instead of logging in twice.
   */
  async forceReauthenticate(staleToken?: string): Promise<Credential> {
    if (this.inflight) return this.inflight;
    const cred = this.credential;
    if (cred && staleToken !== undefined && cred.token !== staleToken && this.isFresh(cred)) return cred;
    this.invalidate();
    return this.singleFlight(() => this.exchange.login());
  }

  invalidate(): void {
    if (this.credential) this.current = 'expired';
    this.credential = null;
  }

  /** Log out if a credential is held. State is cleared even when logout fails. */
  async logout(): Promise<void> {
    const cred = this.credential;
    this.credential = null;
    this.current = 'unauthenticated';
    if (!cred) return;
    try {
      await this.exchange.logout(cred);
      this.log.info('Logged out');
    } catch (err) {
      this.log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Logout failed');
    }
  }

  private isFresh(cred: Credential): boolean {
    return this.now() < cred.expiresAt - this.safetyMarginMs;
  }

  private async refreshOrLogin(cred: Credential): Promise<Credential> {
    try {
      return await this.exchange.refresh(cred);
    } catch (err) {
      this.log.warn({ error: err instanceof Error ? err.message : String(err) }, 'Token refresh failed, logging in again');
      return this.exchange.login();
    }
  }

  private singleFlight(run: () => Promise<Credential>): Promise<Credential> {
    const attempt = (async () => {
      try {
        const cred = await run();
        this.credential = cred;
        this.current = 'authenticated';
        this.log.info({ expiresAt: new Date(cred.expiresAt).toISOString() }, 'Authenticated');
        return cred;
      } catch (err) {
        this.credential = null;
        this.current = 'unauthenticated';
        if (isAgiloftError(err)) throw err;
        throw new AuthenticationError(`Authentication error: ${err instanceof Error ? err.message : String(err)}`);
      } finally {
        this.inflight = null;
      }
    })();
    this.inflight = attempt;
    return attempt;
  }
}
