/**
 * Tool registry — single source of truth for all agent tools.
 */
export type { ToolDefinition, ParamDef, ToolGroup } from './types.js';
export { TOOL_GROUPS } from './types.js';
export { buildRecordTools, toolName, toDispatchArgs, toToolResult } from './tools.js';
export { executeTool, runTool } from './executor.js';
export type { ToolOutcome } from './executor.js';
export {
  useEntityRegistry,
  getToolByName,
  getAllTools,
  getToolsByGroup,
  getToolsByEntity,
  getReadOnlyTools,
  getWriteTools,
  getToolCount,
} from './lookup.js';
