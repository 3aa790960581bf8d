/**
 * LLM-agnostic tool registry types.
 * Define tools once — the MCP server and the CLI consume the same definitions.
 */
import type { AgentContext } from '../../agent/context.js';

/**
 * Neutral JSON Schema property definition.
 */
export interface ParamDef {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  items?: ParamDef;
  properties?: Record<string, ParamDef>;
  required?: string[];
  default?: string | number | boolean;
  minimum?: number;
}

/**
 * SDK-agnostic tool definition.
 */
export interface ToolDefinition {
  /** Unique tool name (e.g., 'agiloft_search_contracts'). */
  name: string;

  description: string;

  /** Parameter definitions (JSON Schema properties). */
  params: Record<string, ParamDef>;

  required: string[];

  group: ToolGroup;

  /** Entity the tool operates on; absent for cross-entity workflows. */
  entity?: string;

  /** True for tools that never mutate records. */
  readOnly: boolean;

  /**
   * Execute the tool. The result is JSON.stringify'd for the caller.
   */
  execute: (ctx: AgentContext, input: Record<string, unknown>) => Promise<unknown>;
}

/** Tool groups for filtering. */
export const TOOL_GROUPS = ['records', 'attachments', 'actions', 'workflows'] as const;

export type ToolGroup = (typeof TOOL_GROUPS)[number];
