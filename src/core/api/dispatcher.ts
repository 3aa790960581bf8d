/**
 * Operation dispatcher — the single entry point for every (entity, operation).
 *
 * lookup → capability check → build + transport (or search) → normalize.
 * Errors leaving here carry entity/operation context.
 */
import { UnsupportedOperationError, isAgiloftError, withContext } from './errors.js';
import { assertBackendSuccess, isRecord, toRecordId } from './envelope.js';
import { buildRequest } from './request-builder.js';
import type { RecordOperation } from './request-builder.js';
import type { ApiRequest, FieldMap, RecordEnvelope } from './types.js';
import type { EntityRegistry } from '../entities/registry.js';
import type { EntityDescriptor, OperationKind } from '../entities/types.js';
import { parseSearchQuery, project } from '../search/engine.js';
import type { SearchEngine } from '../search/engine.js';
import { log as rootLog } from '../../serve/logger.js';
import type { Logger } from '../../serve/logger.js';

export type DispatchResult = RecordEnvelope | RecordEnvelope[];

export interface RequestTransport {
  request(req: ApiRequest): Promise<unknown>;
}

export interface DispatcherDeps {
  registry: EntityRegistry;
  transport: RequestTransport;
  search: SearchEngine;
  logger?: Logger;
}

const ENVELOPE_KEYS = new Set(['success', 'message', 'errors']);

/** Pull the record (or scalar value) out of a non-search response body. */
export function normalizeRecord(
  entity: EntityDescriptor,
  operation: RecordOperation,
  body: unknown,
  requestId: number | null,
): RecordEnvelope {
  let fields: FieldMap;
  let scalar: unknown;

  const result = isRecord(body) ? body.result : undefined;
  const keyed = isRecord(body) ? body[entity.key] : undefined;
  if (isRecord(result)) {
    fields = result;
  } else if (isRecord(keyed)) {
    fields = keyed;
  } else if (result !== undefined && result !== null) {
    scalar = result;
    fields = { value: result };
  } else if (!isRecord(body)) {
    scalar = body;
    fields = { value: body };
  } else {
    fields = Object.fromEntries(Object.entries(body).filter(([k]) => !ENVELOPE_KEYS.has(k)));
  }

  let id = toRecordId(fields.id);
  if (id === null && (operation === 'create' || operation === 'upsert')) id = toRecordId(scalar);
  if (id === null) id = requestId;

  return { id, fields, success: true };
}

function argValue(args: unknown, key: string): unknown {
  return isRecord(args) ? args[key] : undefined;
}

export class OperationDispatcher {
  private readonly log: Logger;

  constructor(private readonly deps: DispatcherDeps) {
    this.log = (deps.logger ?? rootLog).child({ component: 'dispatcher' });
  }

  get registry(): EntityRegistry {
    return this.deps.registry;
  }

  async execute(entityKey: string, operation: OperationKind, args: unknown = {}): Promise<DispatchResult> {
    const entity = this.deps.registry.lookup(entityKey);
    if (!this.deps.registry.supports(entity.key, operation)) {
      throw new UnsupportedOperationError(entity.key, operation);
    }

    const recordId = toRecordId(argValue(args, 'id'));
    try {
      if (operation === 'search') {
        return await this.deps.search.search(entity, parseSearchQuery(entity, args));
      }
      return await this.executeRecord(entity, operation, args, recordId);
    } catch (err) {
      if (!isAgiloftError(err)) throw err;
      this.log.warn({ entity: entity.key, operation, kind: err.kind, error: err.message }, 'Operation failed');
      throw withContext(err, {
        entity: entity.key,
        operation,
        ...(recordId !== null ? { recordId } : {}),
      });
    }
  }

  private async executeRecord(
    entity: EntityDescriptor,
    operation: RecordOperation,
    args: unknown,
    recordId: number | null,
  ): Promise<RecordEnvelope> {
    const req = buildRequest(entity, operation, args);
    const body = await this.deps.transport.request(req);
    assertBackendSuccess(body, { entity: entity.key, operation });

    const envelope = normalizeRecord(entity, operation, body, recordId);
    const fields = argValue(args, 'fields');
    if (operation === 'get' && Array.isArray(fields) && fields.length > 0) {
      const names = fields.filter((f): f is string => typeof f === 'string');
      return { ...envelope, fields: project(envelope.fields, names) };
    }
    return envelope;
  }
}
