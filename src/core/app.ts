/**
 * Wires the core from a resolved configuration.
 */
import { AgiloftClient } from './api/client.js';
import { OperationDispatcher } from './api/dispatcher.js';
import { AuthSessionManager, HttpAuthExchange } from './api/session.js';
import type { FetchLike } from './api/session.js';
import type { AppConfig } from './config.js';
import { loadEntityRegistry } from './entities/registry.js';
import type { EntityRegistry } from './entities/registry.js';
import { SearchEngine } from './search/engine.js';
import { log as rootLog } from '../serve/logger.js';
import type { Logger } from '../serve/logger.js';

export interface AgiloftApp {
  config: AppConfig;
  registry: EntityRegistry;
  session: AuthSessionManager;
  client: AgiloftClient;
  search: SearchEngine;
  dispatcher: OperationDispatcher;
}

export interface CreateAppOptions {
  registry?: EntityRegistry;
  fetch?: FetchLike;
  now?: () => number;
  logger?: Logger;
}

export function createAgiloftApp(config: AppConfig, options: CreateAppOptions = {}): AgiloftApp {
  const logger = options.logger ?? rootLog;
  const registry = options.registry ?? loadEntityRegistry();
  const timeoutMs = config.server.timeout * 1000;

  const exchange = new HttpAuthExchange({
    baseUrl: config.agiloft.baseUrl,
    seed: {
      username: config.agiloft.username,
      password: config.agiloft.password,
      kb: config.agiloft.kb,
      language: config.agiloft.language,
    },
    timeoutMs,
    fetch: options.fetch,
    now: options.now,
  });
  const session = new AuthSessionManager(exchange, { now: options.now, logger });
  const client = new AgiloftClient({
    baseUrl: config.agiloft.baseUrl,
    session,
    language: config.agiloft.language,
    timeoutMs,
    fetch: options.fetch,
    logger,
  });
  const search = new SearchEngine(client, { concurrency: config.server.searchConcurrency, logger });
  const dispatcher = new OperationDispatcher({ registry, transport: client, search, logger });

  return { config, registry, session, client, search, dispatcher };
}
