/**
 * Process-wide structured logger.
 *
 * Writes JSON lines to stderr: stdout belongs to the MCP stdio transport.
 */
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino(
    {
      name: 'agiloft-mcp',
      level,
      redact: {
        paths: ['password', '*.password', 'authorization', '*.authorization', 'token'],
        censor: '***',
      },
    },
    pino.destination(2),
  );
}

const envLevel = process.env.MCP_LOG_LEVEL?.toLowerCase() ?? 'info';

export const log: Logger = createLogger(isLogLevel(envLevel) ? envLevel : 'info');

/** Apply the configured level after config load. */
export function setLogLevel(level: LevelWithSilent): void {
  log.level = level;
}
