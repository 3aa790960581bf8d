#!/usr/bin/env node
/**
 * agiloft-mcp — MCP tool server and CLI for the Agiloft record API.
 *
 * Usage:
 *   agiloft-mcp serve                          # MCP server on stdio
 *   agiloft-mcp entities                       # Registered entities
 *   agiloft-mcp tools --entity contract        # Tool names
 *   agiloft-mcp search contract Acme --limit 5
 *   agiloft-mcp get company 42 --json
 */
import { Command } from 'commander';
import { registerConfigCommand } from './commands/config.js';
import { registerEntitiesCommand } from './commands/entities.js';
import { registerRecordCommands } from './commands/records.js';
import { registerServeCommand } from './commands/serve.js';
import { registerToolsCommand } from './commands/tools.js';
import { SERVER_VERSION } from './serve/mcp-server.js';

const program = new Command();

program
  .name('agiloft-mcp')
  .description('Agiloft record API for tool-calling AI clients')
  .version(SERVER_VERSION);

registerServeCommand(program);
registerEntitiesCommand(program);
registerToolsCommand(program);
registerRecordCommands(program);
registerConfigCommand(program);

await program.parseAsync(process.argv);
