/**
 * Tool executor — wraps registry tool execution with logging and error handling.
 */
import type { AgentContext } from '../../agent/context.js';
import { InvalidArgumentError, isAgiloftError, toErrorPayload } from '../api/errors.js';
import { getToolByName } from './lookup.js';
import { log } from '../../serve/logger.js';

export interface ToolOutcome {
  /** JSON text returned to the caller. */
  output: string;
  isError: boolean;
}

function reportsFailure(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'success' in result && result.success === false;
}

/**
 * Execute a tool by name. Returns the result as a JSON string; failures are
 * returned as an error payload, never thrown.
 */
export async function executeTool(
  ctx: AgentContext,
  toolName: string,
  input: Record<string, unknown>,
): Promise<string> {
  return (await runTool(ctx, toolName, input)).output;
}

/**
 * executeTool with the failure flag the MCP layer reports as `isError`.
 *
 * Logs tool calls to ctx.toolCalls.
 */
export async function runTool(
  ctx: AgentContext,
  toolName: string,
  input: Record<string, unknown>,
): Promise<ToolOutcome> {
  const startTime = Date.now();
  const tool = getToolByName(toolName);

  if (!tool) {
    const errorMsg = `Unknown tool: ${toolName}`;
    ctx.toolCalls.push({ tool_name: toolName, input, output: null, error: errorMsg });
    log.warn({ tool: toolName }, errorMsg);
    return { output: JSON.stringify(toErrorPayload(new InvalidArgumentError(errorMsg)), null, 2), isError: true };
  }

  try {
    const result = await tool.execute(ctx, input);
    const output = typeof result === 'string' ? result : JSON.stringify(result, null, 2);

    ctx.toolCalls.push({ tool_name: toolName, input, output: result });

    log.info(
      { tool: toolName, durationMs: Date.now() - startTime },
      'Tool executed',
    );

    return { output, isError: reportsFailure(result) };
  } catch (err) {
    const payload = toErrorPayload(err);

    ctx.toolCalls.push({ tool_name: toolName, input, output: null, error: payload.error.message });

    const logFields = { tool: toolName, kind: payload.error.kind, error: payload.error.message, durationMs: Date.now() - startTime };
    if (isAgiloftError(err)) log.warn(logFields, 'Tool failed');
    else log.error(logFields, 'Tool failed unexpectedly');

    return { output: JSON.stringify(payload, null, 2), isError: true };
  }
}
