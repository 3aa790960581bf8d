/**
 * Shared action wrapper for commands that talk to the backend.
 *
 * Resolves configuration, builds the core, runs the command body, and logs
 * the session out afterwards. Any error prints in red and exits 1.
 */
import chalk from 'chalk';
import { createAgiloftApp } from '../core/app.js';
import type { AgiloftApp } from '../core/app.js';
import { loadConfig } from '../core/config.js';
import type { AppConfig } from '../core/config.js';
import { isAgiloftError } from '../core/api/errors.js';
import { setLogLevel } from '../serve/logger.js';

export interface CommandOptions {
  config?: string;
  json?: boolean;
  fields?: string[];
  limit?: number;
  entity?: string;
  group?: string;
}

export function resolveConfig(opts: CommandOptions): AppConfig {
  const config = loadConfig({ file: opts.config });
  setLogLevel(config.server.logLevel);
  return config;
}

export function reportError(err: unknown, json = false): never {
  if (json) {
    const kind = isAgiloftError(err) ? err.kind : 'InternalError';
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ success: false, error: { kind, message } }, null, 2));
  } else {
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  }
  process.exit(1);
}

/** Wrap a command body that needs only local state (registry, config). */
export function localAction(fn: (opts: CommandOptions) => Promise<void> | void) {
  return async (opts: CommandOptions): Promise<void> => {
    try {
      await fn(opts);
    } catch (err) {
      reportError(err, opts.json);
    }
  };
}

/** Wrap a command body that calls the backend. */
export function apiAction(fn: (app: AgiloftApp, opts: CommandOptions) => Promise<void>) {
  return async (opts: CommandOptions): Promise<void> => {
    let app: AgiloftApp | undefined;
    try {
      app = createAgiloftApp(resolveConfig(opts));
      await fn(app, opts);
    } catch (err) {
      await app?.session.logout();
      reportError(err, opts.json);
    }
    await app?.session.logout();
  };
}
