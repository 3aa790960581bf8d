/**
 * MCP server — exposes the tool registry over the Model Context Protocol.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { createAgentContext } from '../agent/context.js';
import type { AgiloftApp } from '../core/app.js';
import { getAllTools, runTool, useEntityRegistry } from '../core/registry/index.js';
import type { ToolDefinition } from '../core/registry/index.js';
import { isAgiloftError } from '../core/api/errors.js';
import { log } from './logger.js';
import { PROMPTS, getPrompt } from './prompts.js';

export const SERVER_NAME = 'agiloft-mcp';
export const SERVER_VERSION = '0.1.0';

export function toInputSchema(tool: ToolDefinition): {
  type: 'object';
  properties: ToolDefinition['params'];
  required?: string[];
} {
  return {
    type: 'object',
    properties: tool.params,
    ...(tool.required.length > 0 ? { required: tool.required } : {}),
  };
}

export function createMcpServer(app: Pick<AgiloftApp, 'registry' | 'dispatcher'>): Server {
  useEntityRegistry(app.registry);
  const ctx = createAgentContext(app.dispatcher);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, prompts: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: getAllTools().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { output, isError } = await runTool(ctx, request.params.name, request.params.arguments ?? {});
    return {
      content: [{ type: 'text' as const, text: output }],
      ...(isError ? { isError: true } : {}),
    };
  });

  // ── Prompts ──────────────────────────────────────────────────────

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: PROMPTS.map(({ name, description, arguments: args }) => ({ name, description, arguments: args })),
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    try {
      return getPrompt(request.params.name, request.params.arguments ?? {});
    } catch (err) {
      if (isAgiloftError(err)) throw new McpError(ErrorCode.InvalidParams, err.message);
      throw err;
    }
  });

  return server;
}

/** Serve over stdio until the process is signalled; logs out on shutdown. */
export async function startStdioServer(app: AgiloftApp): Promise<void> {
  const server = createMcpServer(app);
  const transport = new StdioServerTransport();

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down');
    await app.session.logout();
    await server.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await server.connect(transport);
  log.info({ tools: getAllTools().length }, 'MCP server running on stdio');
}
