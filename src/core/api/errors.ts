/**
 * Error taxonomy for the record API.
 *
 * Every failure the core raises is an AgiloftError with a `kind` discriminant,
 * so callers (tool executor, CLI) branch on one error model.
 */

export type ErrorKind =
  | 'UnknownEntity'
  | 'UnsupportedOperation'
  | 'InvalidArgument'
  | 'InvalidRegistryEntry'
  | 'ConfigError'
  | 'AuthenticationError'
  | 'TransportTimeout'
  | 'TransportError'
  | 'BackendOperationFailure';

/** Diagnostic context attached to an error. All members optional. */
export interface ErrorContext {
  entity?: string;
  operation?: string;
  recordId?: number;
  status?: number;
  backendMessage?: string;
}

export class AgiloftError extends Error {
  readonly kind: ErrorKind;
  context: ErrorContext;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.context = context;
  }
}

export class UnknownEntityError extends AgiloftError {
  constructor(readonly key: string, valid: readonly string[]) {
    super('UnknownEntity', `Unknown entity: '${key}'. Valid entities: ${valid.join(', ')}`, { entity: key });
  }
}

export class UnsupportedOperationError extends AgiloftError {
  constructor(entity: string, operation: string) {
    super('UnsupportedOperation', `Operation '${operation}' is not supported for entity '${entity}'`, {
      entity,
      operation,
    });
  }
}

export class InvalidArgumentError extends AgiloftError {
  constructor(message: string, context: ErrorContext = {}) {
    super('InvalidArgument', message, context);
  }
}

export class InvalidRegistryEntryError extends AgiloftError {
  constructor(entity: string, message: string) {
    super('InvalidRegistryEntry', `Invalid registry entry '${entity}': ${message}`, { entity });
  }
}

export class ConfigError extends AgiloftError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

export class AuthenticationError extends AgiloftError {
  constructor(message: string, context: ErrorContext = {}) {
    super('AuthenticationError', message, context);
  }
}

export class TransportTimeoutError extends AgiloftError {
  constructor(method: string, path: string, timeoutMs: number) {
    super('TransportTimeout', `${method} ${path} timed out after ${timeoutMs}ms`);
  }
}

export class TransportError extends AgiloftError {
  constructor(message: string, context: ErrorContext = {}) {
    super('TransportError', message, context);
  }
}

export class BackendOperationFailure extends AgiloftError {
  constructor(message: string, context: ErrorContext = {}) {
    super('BackendOperationFailure', message, context);
  }
}

export function isAgiloftError(err: unknown): err is AgiloftError {
  return err instanceof AgiloftError;
}

/** Merge the dispatcher's context under the error's own; keeps the subclass. */
export function withContext<E extends AgiloftError>(err: E, context: ErrorContext): E {
  err.context = { ...context, ...err.context };
  return err;
}

export interface ErrorPayload {
  success: false;
  error: { kind: ErrorKind | 'InternalError'; message: string } & ErrorContext;
}

/** Render any thrown value into the JSON payload the tool layer returns. */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (isAgiloftError(err)) {
    return { success: false, error: { kind: err.kind, message: err.message, ...err.context } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { success: false, error: { kind: 'InternalError', message } };
}
