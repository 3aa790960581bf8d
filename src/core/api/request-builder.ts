/**
 * Request builder — (entity, operation, args) → concrete REST request.
 *
 * Pure translation: no I/O. Argument errors surface as InvalidArgumentError
 * before anything is sent.
 */
import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import { DEFAULT_DELETE_RULE, DELETE_RULES } from './types.js';
import type { ApiRequest, FieldMap } from './types.js';
import type { EntityDescriptor, OperationKind } from '../entities/types.js';

/** Prefix that marks a linked-field value as a relation reference. */
export const LINK_MARKER = ':';

// ── Argument schemas ─────────────────────────────────────────────

const recordId = z.number({ required_error: 'id is required' }).int().positive();
const fieldMap = z.record(z.unknown());
const fieldName = z.string().min(1, 'field is required');
const base64 = z
  .string()
  .transform((s) => s.replace(/\s+/g, ''))
  .refine((s) => s.length > 0 && s.length % 4 === 0 && /^[A-Za-z0-9+/]*={0,2}$/.test(s), 'invalid base64 content');

const ARG_SCHEMAS = {
  get: z.object({ id: recordId, fields: z.array(z.string()).optional() }),
  create: z.object({ data: fieldMap }),
  update: z.object({ id: recordId, data: fieldMap }),
  delete: z.object({ id: recordId, deleteRule: z.enum(DELETE_RULES).default(DEFAULT_DELETE_RULE) }),
  upsert: z.object({
    query: z.string({ required_error: "upsert requires a match query (e.g. field~='value')" })
      .trim()
      .min(1, "upsert requires a match query (e.g. field~='value')"),
    data: fieldMap,
  }),
  attachFile: z
    .object({
      id: recordId,
      field: fieldName,
      fileName: z.string().min(1, 'fileName is required'),
      content: z.instanceof(Uint8Array).optional(),
      fileContentBase64: base64.optional(),
      contentType: z.string().optional(),
    })
    .refine((a) => a.content !== undefined || a.fileContentBase64 !== undefined, 'file content is required'),
  retrieveAttachment: z.object({ id: recordId, field: fieldName, filePosition: z.number().int().min(0).default(0) }),
  removeAttachment: z.object({ id: recordId, field: fieldName, filePosition: z.number().int().min(0).default(0) }),
  getAttachmentInfo: z.object({ id: recordId, field: fieldName }),
  actionButton: z.object({ id: recordId, name: z.string().min(1, 'name is required') }),
  evaluateFormat: z.object({ id: recordId, formula: z.string().min(1, 'formula is required') }),
} as const;

export type RecordOperation = Exclude<OperationKind, 'search'>;

function parseArgs<T extends z.ZodTypeAny>(
  schema: T,
  entity: EntityDescriptor,
  operation: RecordOperation,
  args: unknown,
): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i: z.ZodIssue) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new InvalidArgumentError(`Invalid arguments for ${operation} ${entity.key}: ${detail}`, {
      entity: entity.key,
      operation,
    });
  }
  return parsed.data;
}

// ── Field encoding ───────────────────────────────────────────────

function encodeLinked(value: string): string | undefined {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === LINK_MARKER) return undefined;
  return trimmed.startsWith(LINK_MARKER) ? trimmed : `${LINK_MARKER}${trimmed}`;
}

/**
 * Wire-encode a field map: linked string values get the relation marker,
 * empty linked values are dropped, null/undefined are dropped everywhere.
 */
export function encodeFields(entity: EntityDescriptor, data: FieldMap): FieldMap {
  const out: FieldMap = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === null || value === undefined) continue;
    if (!entity.linkedFields.has(key)) {
      out[key] = value;
      continue;
    }
    if (typeof value === 'string') {
      const encoded = encodeLinked(value);
      if (encoded !== undefined) out[key] = encoded;
    } else if (Array.isArray(value)) {
      const encoded = value.flatMap((v) => {
        if (typeof v !== 'string') return [v];
        const e = encodeLinked(v);
        return e === undefined ? [] : [e];
      });
      if (encoded.length > 0) out[key] = encoded;
    } else {
      out[key] = value;
    }
  }
  return out;
}

// ── Builders ─────────────────────────────────────────────────────

function recordPath(entity: EntityDescriptor, id: number, action?: string): string {
  return action ? `${entity.resourcePath}/${action}/${id}` : `${entity.resourcePath}/${id}`;
}

/** Search request body: only `query` is honored by the backend; `search` stays empty. */
export function buildSearchRequest(entity: EntityDescriptor, query: string, fields: readonly string[]): ApiRequest {
  return {
    method: 'POST',
    path: `${entity.resourcePath}/search`,
    query: {},
    body: { search: '', field: [...fields], query },
  };
}

/** Build the REST request for any non-search operation. */
export function buildRequest(entity: EntityDescriptor, operation: RecordOperation, args: unknown): ApiRequest {
  switch (operation) {
    case 'get': {
      const a = parseArgs(ARG_SCHEMAS.get, entity, operation, args);
      return {
        method: 'GET',
        path: recordPath(entity, a.id),
        query: a.fields && a.fields.length > 0 ? { fields: a.fields.join(',') } : {},
      };
    }
    case 'create': {
      const a = parseArgs(ARG_SCHEMAS.create, entity, operation, args);
      return { method: 'POST', path: entity.resourcePath, query: {}, body: encodeFields(entity, a.data) };
    }
    case 'update': {
      const a = parseArgs(ARG_SCHEMAS.update, entity, operation, args);
      return { method: 'PUT', path: recordPath(entity, a.id), query: {}, body: encodeFields(entity, a.data) };
    }
    case 'delete': {
      const a = parseArgs(ARG_SCHEMAS.delete, entity, operation, args);
      return { method: 'DELETE', path: recordPath(entity, a.id), query: { deleteRule: a.deleteRule } };
    }
    case 'upsert': {
      const a = parseArgs(ARG_SCHEMAS.upsert, entity, operation, args);
      return {
        method: 'POST',
        path: `${entity.resourcePath}/upsert`,
        query: { query: a.query },
        body: encodeFields(entity, a.data),
      };
    }
    case 'attachFile': {
      const a = parseArgs(ARG_SCHEMAS.attachFile, entity, operation, args);
      const content = a.content ?? new Uint8Array(Buffer.from(a.fileContentBase64 ?? '', 'base64'));
      return {
        method: 'POST',
        path: recordPath(entity, a.id, 'attach'),
        query: { field: a.field, fileName: a.fileName },
        file: { fileName: a.fileName, content, contentType: a.contentType },
      };
    }
    case 'retrieveAttachment': {
      const a = parseArgs(ARG_SCHEMAS.retrieveAttachment, entity, operation, args);
      return {
        method: 'POST',
        path: recordPath(entity, a.id, 'retrieveAttach'),
        query: { field: a.field, filePosition: a.filePosition },
      };
    }
    case 'removeAttachment': {
      const a = parseArgs(ARG_SCHEMAS.removeAttachment, entity, operation, args);
      return {
        method: 'POST',
        path: recordPath(entity, a.id, 'removeAttach'),
        query: { field: a.field, filePosition: a.filePosition },
      };
    }
    case 'getAttachmentInfo': {
      const a = parseArgs(ARG_SCHEMAS.getAttachmentInfo, entity, operation, args);
      return { method: 'POST', path: recordPath(entity, a.id, 'attachInfo'), query: { field: a.field } };
    }
    case 'actionButton': {
      const a = parseArgs(ARG_SCHEMAS.actionButton, entity, operation, args);
      return { method: 'POST', path: recordPath(entity, a.id, 'actionButton'), query: { name: a.name } };
    }
    case 'evaluateFormat': {
      const a = parseArgs(ARG_SCHEMAS.evaluateFormat, entity, operation, args);
      return {
        method: 'POST',
        path: recordPath(entity, a.id, 'evaluateFormat'),
        query: {},
        body: { formula: a.formula },
      };
    }
  }
}
