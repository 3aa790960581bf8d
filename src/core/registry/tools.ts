/**
 * Record tools, generated from the entity registry.
 *
 * Each (entity, supported operation) pair becomes one tool: neutral schema
 * (params) + execute function (calls the dispatcher). Tool arguments use the
 * snake_case names the AI client sees; toDispatchArgs maps them onto the
 * dispatcher's argument names.
 */
import type { ToolDefinition, ParamDef, ToolGroup } from './types.js';
import type { DispatchResult } from '../api/dispatcher.js';
import { DEFAULT_DELETE_RULE, DELETE_RULES } from '../api/types.js';
import type { EntityRegistry } from '../entities/registry.js';
import { OPERATION_KINDS } from '../entities/types.js';
import type { EntityDescriptor, OperationKind } from '../entities/types.js';
import { DEFAULT_SEARCH_LIMIT } from '../search/engine.js';

interface ActionSpec {
  action: string;
  group: ToolGroup;
  readOnly: boolean;
}

const ACTIONS: Record<OperationKind, ActionSpec> = {
  search: { action: 'search', group: 'records', readOnly: true },
  get: { action: 'get', group: 'records', readOnly: true },
  create: { action: 'create', group: 'records', readOnly: false },
  update: { action: 'update', group: 'records', readOnly: false },
  delete: { action: 'delete', group: 'records', readOnly: false },
  upsert: { action: 'upsert', group: 'records', readOnly: false },
  attachFile: { action: 'attach_file', group: 'attachments', readOnly: false },
  retrieveAttachment: { action: 'retrieve_attachment', group: 'attachments', readOnly: true },
  removeAttachment: { action: 'remove_attachment', group: 'attachments', readOnly: false },
  getAttachmentInfo: { action: 'get_attachment_info', group: 'attachments', readOnly: true },
  actionButton: { action: 'action_button', group: 'actions', readOnly: false },
  evaluateFormat: { action: 'evaluate_format', group: 'actions', readOnly: true },
};

export function toolName(entity: EntityDescriptor, operation: OperationKind): string {
  const target = operation === 'search' ? entity.keyPlural : entity.key;
  return `agiloft_${ACTIONS[operation].action}_${target}`;
}

// ── Shared param snippets ────────────────────────────────────────

const RECORD_ID: ParamDef = { type: 'integer', minimum: 1, description: 'Record ID' };
const FIELDS: ParamDef = { type: 'array', items: { type: 'string' }, description: 'Fields to return' };
const ATTACH_FIELD: ParamDef = { type: 'string', description: 'Attachment field name (e.g. attached_file)' };
const FILE_POSITION: ParamDef = {
  type: 'integer',
  minimum: 0,
  default: 0,
  description: 'Position of the file within the field (0 = first)',
};

function describeFields(entity: EntityDescriptor): string {
  const required = new Set(entity.requiredFields);
  return Object.entries(entity.keyFields)
    .map(([name, def]) => {
      const flags = [required.has(name) ? 'required' : '', entity.linkedFields.has(name) ? 'linked' : '']
        .filter(Boolean)
        .join(', ');
      return `- ${name} (${def.type}${flags ? `, ${flags}` : ''}): ${def.description}`;
    })
    .join('\n');
}

function dataParam(entity: EntityDescriptor, verb: string): ParamDef {
  return {
    type: 'object',
    description: `${entity.displayName} fields to ${verb}. Key fields:\n${describeFields(entity)}`,
  };
}

interface ToolShape {
  description: string;
  params: Record<string, ParamDef>;
  required: string[];
}

function shapeFor(entity: EntityDescriptor, operation: OperationKind): ToolShape {
  const one = entity.displayName;
  switch (operation) {
    case 'search':
      return {
        description:
          `Search ${entity.displayNamePlural}. Free text matches any of: ${entity.searchFields.join(', ') || '(none)'}. ` +
          `Structured queries (e.g. ${entity.searchFields[0] ?? 'field'}='value' AND ...) are sent as-is.`,
        params: {
          query: { type: 'string', description: 'Free text or a structured query' },
          fields: { ...FIELDS, description: `Fields to return (default: ${entity.defaultFields.join(', ')})` },
          limit: { type: 'integer', minimum: 1, default: DEFAULT_SEARCH_LIMIT, description: 'Maximum records to return' },
        },
        required: ['query'],
      };
    case 'get':
      return {
        description: `Get a ${one} by ID.`,
        params: { record_id: RECORD_ID, fields: FIELDS },
        required: ['record_id'],
      };
    case 'create':
      return {
        description: `Create a ${one}. Required fields: ${entity.requiredFields.join(', ') || '(none)'}. Linked fields take the display value of the related record.`,
        params: { data: dataParam(entity, 'set') },
        required: ['data'],
      };
    case 'update':
      return {
        description: `Update fields of an existing ${one}.`,
        params: { record_id: RECORD_ID, data: dataParam(entity, 'update') },
        required: ['record_id', 'data'],
      };
    case 'delete':
      return {
        description: `Delete a ${one}.`,
        params: {
          record_id: RECORD_ID,
          delete_rule: {
            type: 'string',
            enum: [...DELETE_RULES],
            default: DEFAULT_DELETE_RULE,
            description: 'How linked records are handled',
          },
        },
        required: ['record_id'],
      };
    case 'upsert':
      return {
        description: `Update the ${one} matching the query, or create it when none matches.`,
        params: {
          query: { type: 'string', description: "Match query (e.g. field~='value')" },
          data: dataParam(entity, 'set'),
        },
        required: ['query', 'data'],
      };
    case 'attachFile':
      return {
        description: `Attach a file to a ${one} field.`,
        params: {
          record_id: RECORD_ID,
          field: ATTACH_FIELD,
          file_name: { type: 'string', description: 'File name to store' },
          file_content_base64: { type: 'string', description: 'File content, base64-encoded' },
        },
        required: ['record_id', 'field', 'file_name', 'file_content_base64'],
      };
    case 'retrieveAttachment':
      return {
        description: `Download a file attached to a ${one}.`,
        params: { record_id: RECORD_ID, field: ATTACH_FIELD, file_position: FILE_POSITION },
        required: ['record_id', 'field'],
      };
    case 'removeAttachment':
      return {
        description: `Remove a file attached to a ${one}.`,
        params: { record_id: RECORD_ID, field: ATTACH_FIELD, file_position: FILE_POSITION },
        required: ['record_id', 'field'],
      };
    case 'getAttachmentInfo':
      return {
        description: `List the files attached to a ${one} field.`,
        params: { record_id: RECORD_ID, field: ATTACH_FIELD },
        required: ['record_id', 'field'],
      };
    case 'actionButton':
      return {
        description: `Press an action button on a ${one}.`,
        params: { record_id: RECORD_ID, button_name: { type: 'string', description: 'Action button name' } },
        required: ['record_id', 'button_name'],
      };
    case 'evaluateFormat':
      return {
        description: `Evaluate a formula in the context of a ${one}.`,
        params: { record_id: RECORD_ID, formula: { type: 'string', description: 'Formula to evaluate' } },
        required: ['record_id', 'formula'],
      };
  }
}

// ── Input mapping ────────────────────────────────────────────────

const ARG_NAMES: Record<string, string> = {
  record_id: 'id',
  data: 'data',
  delete_rule: 'deleteRule',
  file_name: 'fileName',
  file_content_base64: 'fileContentBase64',
  file_position: 'filePosition',
  button_name: 'name',
  formula: 'formula',
  field: 'field',
  query: 'query',
  fields: 'fields',
  limit: 'limit',
};

const NUMERIC_ARGS = new Set(['record_id', 'file_position', 'limit']);

function coerce(name: string, value: unknown): unknown {
  if (NUMERIC_ARGS.has(name) && typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  if (name === 'fields' && typeof value === 'string') {
    return value.split(',').map((f) => f.trim()).filter(Boolean);
  }
  return value;
}

/** Map tool input onto dispatcher args. Unknown and absent inputs are dropped. */
export function toDispatchArgs(input: Record<string, unknown>): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(input)) {
    const target = ARG_NAMES[name];
    if (target === undefined || value === undefined || value === null) continue;
    args[target] = coerce(name, value);
  }
  return args;
}

/** Tool success payload. */
export function toToolResult(operation: OperationKind, entity: string, result: DispatchResult): Record<string, unknown> {
  if (Array.isArray(result)) {
    return { success: true, operation, entity, count: result.length, data: result.map((r) => r.fields) };
  }
  return {
    success: true,
    operation,
    entity,
    ...(result.id !== null ? { record_id: result.id } : {}),
    data: result.fields,
  };
}

// ── Generation ───────────────────────────────────────────────────

export function buildRecordTools(registry: EntityRegistry): ToolDefinition[] {
  const tools: ToolDefinition[] = [];
  for (const entity of registry.list()) {
    for (const operation of OPERATION_KINDS) {
      if (!entity.operations.has(operation)) continue;
      const spec = ACTIONS[operation];
      const shape = shapeFor(entity, operation);
      tools.push({
        name: toolName(entity, operation),
        description: shape.description,
        params: shape.params,
        required: shape.required,
        group: spec.group,
        entity: entity.key,
        readOnly: spec.readOnly,
        execute: async (ctx, input) =>
          toToolResult(operation, entity.key, await ctx.dispatcher.execute(entity.key, operation, toDispatchArgs(input))),
      });
    }
  }
  return tools;
}
