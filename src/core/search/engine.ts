/**
 * Search engine — fan-out/merge over the backend's single-field partial match.
 *
 * The backend cannot OR a `~=` across fields, so free text becomes one
 * sub-query per search field. Sub-results are buffered by field index and
 * merged in declared field order, deduplicated by record id. Projection and
 * limit apply to the merged list only.
 */
import { z } from 'zod';
import { InvalidArgumentError } from '../api/errors.js';
import { assertBackendSuccess, extractRecords, toRecordId } from '../api/envelope.js';
import { buildSearchRequest } from '../api/request-builder.js';
import type { ApiRequest, FieldMap, RecordEnvelope } from '../api/types.js';
import type { EntityDescriptor } from '../entities/types.js';
import { classifyQuery, partialMatchQuery } from './query.js';
import type { QueryKind } from './query.js';
import { mapConcurrent } from './pool.js';
import { log as rootLog } from '../../serve/logger.js';
import type { Logger } from '../../serve/logger.js';

export const DEFAULT_SEARCH_LIMIT = 50;
export const DEFAULT_SEARCH_CONCURRENCY = 4;

export const searchArgsSchema = z.object({
  query: z.string().default(''),
  fields: z.array(z.string().min(1)).min(1).optional(),
  limit: z.number().int().positive().default(DEFAULT_SEARCH_LIMIT),
});

export type SearchArgs = z.input<typeof searchArgsSchema>;

export interface SearchQuery {
  text: string;
  kind: QueryKind;
  fields: readonly string[];
  limit: number;
}

/** The slice of the transport client the engine needs. */
export interface SearchTransport {
  request(req: ApiRequest): Promise<unknown>;
}

export interface SearchEngineOptions {
  concurrency?: number;
  logger?: Logger;
}

/** Parse raw search args into a classified SearchQuery. */
export function parseSearchQuery(entity: EntityDescriptor, args: unknown): SearchQuery {
  const parsed = searchArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidArgumentError(`Invalid arguments for search ${entity.key}: ${detail}`, {
      entity: entity.key,
      operation: 'search',
    });
  }
  const { query, fields, limit } = parsed.data;
  return {
    text: query,
    kind: classifyQuery(query),
    fields: fields ?? entity.defaultFields,
    limit,
  };
}

/** Keep only the projected fields that the record carries. */
export function project(record: FieldMap, fields: readonly string[]): FieldMap {
  const out: FieldMap = {};
  for (const f of fields) {
    if (f in record) out[f] = record[f];
  }
  return out;
}

/** Merge sub-results in order, first occurrence of each id wins. */
export function mergeById(resultSets: readonly FieldMap[][]): FieldMap[] {
  const seen = new Set<string>();
  const merged: FieldMap[] = [];
  for (const records of resultSets) {
    for (const record of records) {
      const id = record.id;
      if (typeof id === 'number' || typeof id === 'string') {
        const key = String(id);
        if (seen.has(key)) continue;
        seen.add(key);
      }
      merged.push(record);
    }
  }
  return merged;
}

export class SearchEngine {
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(
    private readonly transport: SearchTransport,
    options: SearchEngineOptions = {},
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_SEARCH_CONCURRENCY;
    this.log = (options.logger ?? rootLog).child({ component: 'search' });
  }

  /** Sub-query texts for a search: one per search field for free text, else the text as-is. */
  plan(entity: EntityDescriptor, query: SearchQuery): string[] {
    if (query.kind === 'free-text' && query.text.trim() !== '' && entity.searchFields.length > 0) {
      return entity.searchFields.map((field) => partialMatchQuery(field, query.text.trim()));
    }
    return [query.text];
  }

  async search(entity: EntityDescriptor, query: SearchQuery): Promise<RecordEnvelope[]> {
    const subQueries = this.plan(entity, query);
    // id is always fetched so the merge can deduplicate
    const wireFields = query.fields.includes('id') ? query.fields : ['id', ...query.fields];
    const startTime = Date.now();

    const resultSets = await mapConcurrent(subQueries, this.concurrency, async (text) => {
      const body = await this.transport.request(buildSearchRequest(entity, text, wireFields));
      assertBackendSuccess(body, { entity: entity.key, operation: 'search' });
      return extractRecords(body);
    });

    const merged = mergeById(resultSets);
    const records = merged.slice(0, query.limit).map((r) => ({
      id: toRecordId(r.id),
      fields: project(r, query.fields),
      success: true,
    }));

    this.log.info(
      {
        entity: entity.key,
        kind: query.kind,
        subQueries: subQueries.length,
        matched: merged.length,
        returned: records.length,
        durationMs: Date.now() - startTime,
      },
      'Search executed',
    );
    return records;
  }
}
