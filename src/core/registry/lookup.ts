/**
 * O(1) tool lookup via Map.
 * Lazy-initialized on first access from the bundled entity registry; the
 * server swaps in its own registry with useEntityRegistry().
 */
import type { ToolDefinition, ToolGroup } from './types.js';
import { buildRecordTools } from './tools.js';
import { WORKFLOW_TOOLS } from '../workflows/index.js';
import { loadEntityRegistry } from '../entities/registry.js';
import type { EntityRegistry } from '../entities/registry.js';

let tools: ToolDefinition[] | null = null;
let toolMap: Map<string, ToolDefinition> | null = null;

/** Rebuild the tool set from a registry. */
export function useEntityRegistry(registry: EntityRegistry): void {
  tools = [...buildRecordTools(registry), ...WORKFLOW_TOOLS];
  toolMap = new Map(tools.map((t) => [t.name, t]));
}

function ensureTools(): { list: ToolDefinition[]; map: Map<string, ToolDefinition> } {
  if (!tools || !toolMap) useEntityRegistry(loadEntityRegistry());
  return { list: tools ?? [], map: toolMap ?? new Map() };
}

/** Get a single tool by name. O(1). */
export function getToolByName(name: string): ToolDefinition | undefined {
  return ensureTools().map.get(name);
}

/** Get all tool definitions: record tools, then workflows. */
export function getAllTools(): ToolDefinition[] {
  return ensureTools().list;
}

export function getToolsByGroup(group: ToolGroup): ToolDefinition[] {
  return ensureTools().list.filter((t) => t.group === group);
}

/** Record tools of one entity. */
export function getToolsByEntity(entity: string): ToolDefinition[] {
  return ensureTools().list.filter((t) => t.entity === entity);
}

/** Get read-only tools (search, get, attachment reads, formula evaluation). */
export function getReadOnlyTools(): ToolDefinition[] {
  return ensureTools().list.filter((t) => t.readOnly);
}

/** Get write tools (create, update, delete, upsert, attachments, buttons). */
export function getWriteTools(): ToolDefinition[] {
  return ensureTools().list.filter((t) => !t.readOnly);
}

export function getToolCount(): number {
  return ensureTools().list.length;
}
