/**
 * Entity descriptor types. Entities are data, not classes: one generic
 * dispatcher serves every entry in the table.
 */

export const OPERATION_KINDS = [
  'search',
  'get',
  'create',
  'update',
  'delete',
  'upsert',
  'attachFile',
  'retrieveAttachment',
  'removeAttachment',
  'getAttachmentInfo',
  'actionButton',
  'evaluateFormat',
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export type FieldType = 'string' | 'number' | 'integer' | 'boolean' | 'array';

export interface FieldDef {
  type: FieldType;
  description: string;
}

export interface EntityDescriptor {
  /** Registry key, e.g. 'contract'. */
  readonly key: string;
  /** Plural key used in tool names, e.g. 'contracts'. */
  readonly keyPlural: string;
  /** API resource path, e.g. '/contract'. */
  readonly resourcePath: string;
  readonly displayName: string;
  readonly displayNamePlural: string;
  readonly keyFields: Readonly<Record<string, FieldDef>>;
  /** Free-text search fields, in merge order. */
  readonly searchFields: readonly string[];
  readonly requiredFields: readonly string[];
  /** Relation fields, wire-encoded as `:value`. */
  readonly linkedFields: ReadonlySet<string>;
  /** Projection used when a search names no fields. */
  readonly defaultFields: readonly string[];
  readonly operations: ReadonlySet<OperationKind>;
}

export function isOperationKind(value: string): value is OperationKind {
  return (OPERATION_KINDS as readonly string[]).includes(value);
}
