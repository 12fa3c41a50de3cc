export type ErrorKind = 'validation' | 'not_found' | 'authorization' | 'computation' | 'upstream';

export class ServiceError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly code: string,
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

export class ValidationError extends ServiceError {
  constructor(
    public readonly field: string,
    message: string,
    code = 'invalid_request',
    context?: Record<string, unknown>,
  ) {
    super('validation', code, message, { field, ...context });
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ServiceError {
  constructor(
    public readonly resource: string,
    public readonly identifier: string,
  ) {
    super('not_found', `${resource}_not_found`, `${resource} not found: ${identifier}`, { [`${resource}Id`]: identifier });
    this.name = 'NotFoundError';
  }
}

export class AuthorizationError extends ServiceError {
  constructor(action: string) {
    super('authorization', 'forbidden', 'Insufficient permission for this operation', { action });
    this.name = 'AuthorizationError';
  }
}

export class ComputationError extends ServiceError {
  constructor(code: string, message: string, context?: Record<string, unknown>) {
    super('computation', code, message, context);
    this.name = 'ComputationError';
  }
}

export class UpstreamError extends ServiceError {
  constructor(code: string, message: string, cause: unknown, context?: Record<string, unknown>) {
    super('upstream', code, message, context, { cause });
    this.name = 'UpstreamError';
  }
}

// ── Result envelope ───────────────────────────────────────────────────────────

export interface ServiceFailure {
  kind: ErrorKind;
  code: string;
  message: string;
  context?: Record<string, unknown>;
}

export type OperationResult<T> = { success: true; data: T } | { success: false; error: ServiceFailure };

export function ok<T>(data: T): OperationResult<T> {
  return { success: true, data };
}

export function toFailure(err: unknown): ServiceFailure {
  if (err instanceof ServiceError) {
    return {
      kind: err.kind,
      code: err.code,
      message: err.message,
      ...(err.context ? { context: err.context } : {}),
    };
  }
  return {
    kind: 'computation',
    code: 'calculation_error',
    message: err instanceof Error ? err.message : String(err),
  };
}

export function fail<T>(err: unknown): OperationResult<T> {
  return { success: false, error: toFailure(err) };
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
