/**
 * Entity registry — immutable lookup table of entity descriptors.
 *
 * Built once at startup from `data/entities.json`. Construction fails fast on
 * malformed entries so a bad descriptor never reaches runtime dispatch.
 */
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, InvalidRegistryEntryError, UnknownEntityError } from '../api/errors.js';
import { OPERATION_KINDS, isOperationKind } from './types.js';
import type { EntityDescriptor, OperationKind } from './types.js';

const fieldDefSchema = z.object({
  type: z.enum(['string', 'number', 'integer', 'boolean', 'array']),
  description: z.string(),
});

export const entityEntrySchema = z.object({
  key: z.string().min(1),
  keyPlural: z.string().min(1),
  resourcePath: z.string().startsWith('/'),
  displayName: z.string().min(1),
  displayNamePlural: z.string().min(1),
  keyFields: z.record(fieldDefSchema),
  searchFields: z.array(z.string()).default([]),
  requiredFields: z.array(z.string()).default([]),
  linkedFields: z.array(z.string()).default([]),
  defaultFields: z.array(z.string()).min(1),
  operations: z.array(z.string()).default([...OPERATION_KINDS]),
});

export type EntityEntry = z.input<typeof entityEntrySchema>;

const registryFileSchema = z.object({ entities: z.array(entityEntrySchema) });

function toDescriptor(raw: EntityEntry): EntityDescriptor {
  const parsed = entityEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const key = typeof raw.key === 'string' && raw.key ? raw.key : '(unnamed)';
    throw new InvalidRegistryEntryError(key, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  const entry = parsed.data;
  const declared = new Set(Object.keys(entry.keyFields));

  const checks: Array<[string, string[]]> = [
    ['required field', entry.requiredFields],
    ['linked field', entry.linkedFields],
    ['search field', entry.searchFields],
  ];
  for (const [label, fields] of checks) {
    const missing = fields.filter((f) => !declared.has(f));
    if (missing.length > 0) {
      throw new InvalidRegistryEntryError(entry.key, `${label}(s) not declared in keyFields: ${missing.join(', ')}`);
    }
  }

  const operations = new Set<OperationKind>();
  for (const op of entry.operations) {
    if (!isOperationKind(op)) {
      throw new InvalidRegistryEntryError(entry.key, `unknown operation '${op}'`);
    }
    operations.add(op);
  }

  return Object.freeze({
    key: entry.key,
    keyPlural: entry.keyPlural,
    resourcePath: entry.resourcePath,
    displayName: entry.displayName,
    displayNamePlural: entry.displayNamePlural,
    keyFields: Object.freeze({ ...entry.keyFields }),
    searchFields: Object.freeze([...entry.searchFields]),
    requiredFields: Object.freeze([...entry.requiredFields]),
    linkedFields: new Set(entry.linkedFields),
    defaultFields: Object.freeze([...entry.defaultFields]),
    operations,
  });
}

export class EntityRegistry {
  private readonly entities = new Map<string, EntityDescriptor>();

  constructor(entries: readonly EntityEntry[]) {
    for (const raw of entries) {
      const descriptor = toDescriptor(raw);
      if (this.entities.has(descriptor.key)) {
        throw new InvalidRegistryEntryError(descriptor.key, 'duplicate entity key');
      }
      this.entities.set(descriptor.key, descriptor);
    }
  }

  /** Get a descriptor by key. Throws UnknownEntityError if absent. */
  lookup(key: string): EntityDescriptor {
    const entity = this.entities.get(key);
    if (!entity) throw new UnknownEntityError(key, this.keys());
    return entity;
  }

  /** False for unknown entities as well as unsupported operations. */
  supports(key: string, operation: OperationKind): boolean {
    return this.entities.get(key)?.operations.has(operation) ?? false;
  }

  keys(): string[] {
    return Array.from(this.entities.keys());
  }

  list(): EntityDescriptor[] {
    return Array.from(this.entities.values());
  }
}

// ── Loading ──────────────────────────────────────────────────────

function resolveRegistryPath(): string {
  const __dir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    // Sources (src/core/entities/)
    join(__dir, '..', '..', '..', 'data', 'entities.json'),
    // Build output (dist/src/core/entities/)
    join(__dir, '..', '..', '..', '..', 'data', 'entities.json'),
  ];
  for (const p of candidates) {
    try {
      readFileSync(p, 'utf-8');
      return p;
    } catch {
      // try next
    }
  }
  throw new ConfigError(`Entity registry data not found. Looked in: ${candidates.join(', ')}`);
}

/** Load and validate the registry from its JSON data file. */
export function loadEntityRegistry(path?: string): EntityRegistry {
  const resolved = path ?? resolveRegistryPath();
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read entity registry ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const file = registryFileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(`Malformed entity registry ${resolved}: ${file.error.issues[0]?.message ?? 'invalid'}`);
  }
  return new EntityRegistry(file.data.entities);
}
