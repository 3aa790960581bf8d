/**
 * Shared plumbing for composite workflow tools.
 */
import { z } from 'zod';
import type { AgentContext } from '../../agent/context.js';
import type { DispatchResult } from '../api/dispatcher.js';
import { InvalidArgumentError, toErrorPayload } from '../api/errors.js';
import type { ErrorPayload } from '../api/errors.js';
import type { FieldMap, RecordEnvelope } from '../api/types.js';
import { sanitizeQueryValue } from '../search/query.js';

export interface WorkflowResult {
  success: boolean;
  operation: string;
  data?: Record<string, unknown>;
  next_steps?: string[];
  warnings?: string[];
  error?: string;
  /** Kind and context of the error that stopped the workflow. */
  error_details?: ErrorPayload['error'];
  partial_data?: Record<string, unknown>;
}

export function workflowResponse(
  operation: string,
  data: Record<string, unknown>,
  nextSteps: string[] = [],
  warnings: string[] = [],
): WorkflowResult {
  const result: WorkflowResult = { success: true, operation, data };
  if (nextSteps.length > 0) result.next_steps = nextSteps;
  if (warnings.length > 0) result.warnings = warnings;
  return result;
}

export function workflowError(
  operation: string,
  error: string,
  partialData?: Record<string, unknown>,
): WorkflowResult {
  const result: WorkflowResult = { success: false, operation, error };
  if (partialData && Object.keys(partialData).length > 0) result.partial_data = partialData;
  return result;
}

/** Failure caused by a thrown error; keeps its kind alongside the message. */
export function workflowFailure(
  operation: string,
  err: unknown,
  partialData?: Record<string, unknown>,
): WorkflowResult {
  const { error } = toErrorPayload(err);
  return { ...workflowError(operation, error.message, partialData), error_details: error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function parseInput<T extends z.ZodTypeAny>(schema: T, tool: string, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i: z.ZodIssue) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new InvalidArgumentError(`Invalid arguments for ${tool}: ${detail}`);
  }
  return parsed.data;
}

/** Drop null, undefined and empty-string values. */
export function stripEmpty(data: FieldMap): FieldMap {
  return Object.fromEntries(Object.entries(data).filter(([, v]) => v !== null && v !== undefined && v !== ''));
}

export function asList(result: DispatchResult): RecordEnvelope[] {
  return Array.isArray(result) ? result : [result];
}

export function asOne(result: DispatchResult): RecordEnvelope {
  const [first] = asList(result);
  if (!first) throw new InvalidArgumentError('Expected a single record');
  return first;
}

/** Flat record view for workflow output. */
export function recordView(record: RecordEnvelope): FieldMap {
  return record.id !== null ? { id: record.id, ...record.fields } : { ...record.fields };
}

export const COMPANY_FIELDS = ['id', 'company_name', 'type_of_company', 'status'];

/** Exact-name company lookup. */
export async function findCompany(
  ctx: AgentContext,
  name: string,
  fields: readonly string[] = COMPANY_FIELDS,
): Promise<RecordEnvelope | undefined> {
  const result = await ctx.dispatcher.execute('company', 'search', {
    query: `company_name='${sanitizeQueryValue(name)}'`,
    fields: [...fields],
    limit: 1,
  });
  return asList(result)[0];
}
