/**
 * Shared test fixtures: in-process stand-ins for the backend.
 */
import { vi } from 'vitest';
import type { AuthExchange, Credential, FetchLike } from '../src/core/api/session.js';
import type { ApiRequest } from '../src/core/api/types.js';
import { EntityRegistry, loadEntityRegistry } from '../src/core/entities/registry.js';
import type { EntityEntry } from '../src/core/entities/registry.js';

export const BASE_URL = 'https://kb.example.test/api';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}

export function bundledRegistry(): EntityRegistry {
  return loadEntityRegistry();
}

export function widgetEntry(overrides: Partial<EntityEntry> = {}): EntityEntry {
  return {
    key: 'widget',
    keyPlural: 'widgets',
    resourcePath: '/widget',
    displayName: 'Widget',
    displayNamePlural: 'Widgets',
    keyFields: {
      name: { type: 'string', description: 'Widget name' },
      owner: { type: 'string', description: 'Owning company' },
    },
    searchFields: ['name'],
    linkedFields: ['owner'],
    defaultFields: ['id', 'name'],
    ...overrides,
  };
}

export function widgetRegistry(overrides: Partial<EntityEntry> = {}): EntityRegistry {
  return new EntityRegistry([widgetEntry(overrides)]);
}

/** Resolvable promise for ordering concurrent work in tests. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (err: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Exchange that hands out tok-1, tok-2, … each valid for 15 minutes from `now()`. */
export function fakeExchange(now: () => number) {
  let issued = 0;
  const next = (): Credential => {
    issued += 1;
    return { token: `tok-${issued}`, expiresAt: now() + 15 * 60_000 };
  };
  return {
    login: vi.fn<AuthExchange['login']>(async () => next()),
    refresh: vi.fn<AuthExchange['refresh']>(async () => next()),
    logout: vi.fn<AuthExchange['logout']>(async () => undefined),
  } satisfies AuthExchange;
}

export function fetchMock() {
  return vi.fn<FetchLike>();
}

/** Transport stand-in for engine/dispatcher tests. */
export function transportMock() {
  return { request: vi.fn<(req: ApiRequest) => Promise<unknown>>() };
}

export function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

export function header(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}
