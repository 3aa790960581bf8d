import { Command } from 'commander';
import { createAgiloftApp } from '../core/app.js';
import { startStdioServer } from '../serve/mcp-server.js';
import { localAction, resolveConfig } from './api-action.js';

export function registerServeCommand(program: Command): void {
  // ── agiloft-mcp serve ─────────────────────────────────────────
  program
    .command('serve')
    .description('Start the MCP server on stdio')
    .option('--config <file>', 'Config file (default: ./agiloft-mcp.json)')
    .action(localAction(async (opts) => {
      await startStdioServer(createAgiloftApp(resolveConfig(opts)));
    }));
}
