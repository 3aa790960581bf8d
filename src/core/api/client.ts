/**
 * Transport client — verb-based HTTP execution against the Agiloft REST API.
 *
 * Every call asks the session manager for a bearer credential. An HTTP 401 is
 * retried exactly once after a forced re-login; nothing else is retried.
 */
import {
  AuthenticationError,
  TransportError,
  TransportTimeoutError,
} from './errors.js';
import type { AuthSessionManager, FetchLike } from './session.js';
import type { ApiRequest, QueryParams } from './types.js';
import { log as rootLog } from '../../serve/logger.js';
import type { Logger } from '../../serve/logger.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface AgiloftClientOptions {
  baseUrl: string;
  session: AuthSessionManager;
  language?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export class AgiloftClient {
  private readonly baseUrl: string;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(private readonly options: AgiloftClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.language = options.language ?? 'en';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = (options.logger ?? rootLog).child({ component: 'client' });
  }

  get session(): AuthSessionManager {
    return this.options.session;
  }

  /**
   * Execute a built request. Returns the parsed JSON body, or the raw text when
   * the body is not JSON (attachment content).
   */
  async request(req: ApiRequest): Promise<unknown> {
    const startTime = Date.now();
    const timeoutMs = req.timeoutMs ?? this.timeoutMs;
    const cred = await this.session.getCredential();
    let res = await this.send(req, cred.token);

    if (res.status === 401) {
      await res.body?.cancel();
      this.log.warn({ method: req.method, path: req.path }, 'Received 401, re-authenticating once');
      const fresh = await this.session.forceReauthenticate(cred.token);
      res = await this.send(req, fresh.token);
      if (res.status === 401) {
        const text = await this.readText(res, req, timeoutMs);
        throw new AuthenticationError(`Authorization rejected after re-authentication: ${req.method} ${req.path}`, {
          status: 401,
          backendMessage: text || undefined,
        });
      }
    }

    const text = await this.readText(res, req, timeoutMs);
    if (!res.ok) {
      this.log.error({ method: req.method, path: req.path, status: res.status }, 'API request failed');
      throw new TransportError(`API request failed: ${res.status} - ${text}`, {
        status: res.status,
        backendMessage: text || undefined,
      });
    }

    this.log.debug({ method: req.method, path: req.path, durationMs: Date.now() - startTime }, 'API request');
    return parseBody(text);
  }

  private async send(req: ApiRequest, token: string): Promise<Response> {
    const url = this.buildUrl(req.path, req.query);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };

    let body: string | FormData | undefined;
    if (req.file) {
      const form = new FormData();
      const blob = new Blob([req.file.content], { type: req.file.contentType ?? 'application/octet-stream' });
      form.append('file', blob, req.file.fileName);
      body = form;
    } else if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(req.body);
    }

    const timeoutMs = req.timeoutMs ?? this.timeoutMs;
    try {
      return await this.fetchImpl(url, {
        method: req.method,
        headers,
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw transportFailure(err, req, timeoutMs);
    }
  }

  /** The timeout signal also covers the body, so a stalled stream fails the same way. */
  private async readText(res: Response, req: ApiRequest, timeoutMs: number): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      throw transportFailure(err, req, timeoutMs);
    }
  }

  private buildUrl(path: string, query: QueryParams): string {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    if (!url.searchParams.has('lang')) url.searchParams.set('lang', this.language);
    return url.toString();
  }
}

function transportFailure(err: unknown, req: ApiRequest, timeoutMs: number): TransportError | TransportTimeoutError {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new TransportTimeoutError(req.method, req.path, timeoutMs);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`HTTP client error for ${req.method} ${req.path}: ${message}`);
}

function parseBody(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
