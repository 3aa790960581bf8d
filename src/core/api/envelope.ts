/**
 * Response envelope helpers. The backend may answer HTTP 200 with
 * `success: false`; that is turned into BackendOperationFailure here so callers
 * see one failure channel.
 */
import { BackendOperationFailure } from './errors.js';
import type { ErrorContext } from './errors.js';
import type { FieldMap } from './types.js';

export function isRecord(value: unknown): value is FieldMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorDetails(errors: unknown): string[] {
  if (!Array.isArray(errors)) return [];
  return errors
    .map((e) => (isRecord(e) && typeof e.message === 'string' ? e.message : typeof e === 'string' ? e : ''))
    .filter((m) => m.length > 0);
}

/** Throws BackendOperationFailure when the body carries `success: false`. */
export function assertBackendSuccess(body: unknown, context: ErrorContext): void {
  if (!isRecord(body) || body.success !== false) return;

  const message = typeof body.message === 'string' && body.message ? body.message : 'Unknown error';
  const details = errorDetails(body.errors);
  const full = details.length > 0 ? `${message} - ${details.join('; ')}` : message;
  const label = context.operation ?? 'Operation';
  throw new BackendOperationFailure(`${label.charAt(0).toUpperCase()}${label.slice(1)} failed: ${full}`, {
    ...context,
    backendMessage: full,
  });
}

/** Records of a search response: `result` array, or a bare array body. */
export function extractRecords(body: unknown): FieldMap[] {
  const list = isRecord(body) ? body.result : body;
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

/** Numeric record id from a backend value, or null. */
export function toRecordId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}
