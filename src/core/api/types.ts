/**
 * Wire and envelope types for the Agiloft REST API.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number>;

export type FieldMap = Record<string, unknown>;

/** Multipart file part for attach operations. */
export interface FileUpload {
  fileName: string;
  content: Uint8Array;
  contentType?: string;
}

/** A fully built request, relative to the client's base URL. */
export interface ApiRequest {
  method: HttpMethod;
  path: string;
  query: QueryParams;
  body?: FieldMap;
  file?: FileUpload;
  /** Overrides the client's default timeout for this call. */
  timeoutMs?: number;
}

export interface LoginResult {
  access_token: string;
  /** Minutes. */
  expires_in?: number;
}

/** Normalized result of a single-record operation. */
export interface RecordEnvelope {
  id: number | null;
  fields: FieldMap;
  success: boolean;
}

export const DELETE_RULES = [
  'ERROR_IF_DEPENDANTS',
  'APPLY_DELETE_WHERE_POSSIBLE',
  'DELETE_WHERE_POSSIBLE_OTHERWISE_UNLINK',
  'UNLINK_WHERE_POSSIBLE_OTHERWISE_DELETE',
] as const;

export type DeleteRule = (typeof DELETE_RULES)[number];

export const DEFAULT_DELETE_RULE: DeleteRule = 'UNLINK_WHERE_POSSIBLE_OTHERWISE_DELETE';
