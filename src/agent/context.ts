/**
 * Per-session context handed to every tool execution.
 */
import type { OperationDispatcher } from '../core/api/dispatcher.js';

export interface ToolCallRecord {
  tool_name: string;
  input: Record<string, unknown>;
  output: unknown;
  error?: string;
}

export interface AgentContext {
  dispatcher: OperationDispatcher;
  /** Every tool call made through this context, in order. */
  toolCalls: ToolCallRecord[];
}

export function createAgentContext(dispatcher: OperationDispatcher): AgentContext {
  return { dispatcher, toolCalls: [] };
}
