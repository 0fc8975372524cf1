import { ResourceIdentity } from './ResourceIdentity';
import type { Action } from './types';
import type { SpecValue } from './values';

export type ReconcileErrorKind = 'AuthError' | 'ImmutableFieldConflict' | 'ProviderRequestError' | 'OperationTimeout' | 'ProvisioningFailed';

export interface ReconcileErrorContext {
  identity?: ResourceIdentity;
  action?: Action;
  cause?: unknown;
}

/**
 * Base class of every error the engine reports.
 * `identity` and `action` tell a caller what was being attempted, so "nothing was touched" can be told apart from "partially applied".
 */
export abstract class ReconcileError extends Error {
  abstract readonly kind: ReconcileErrorKind;
  readonly identity?: ResourceIdentity;
  readonly action?: Action;

  constructor(message: string, context: ReconcileErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.identity = context.identity;
    this.action = context.action;
  }
}

export class AuthError extends ReconcileError {
  readonly kind = 'AuthError';
  readonly sourcesTried: string[];

  constructor(message: string, sourcesTried: string[] = [], cause?: unknown) {
    super(message, { cause });
    this.sourcesTried = sourcesTried;
  }
}

export class ImmutableFieldConflict extends ReconcileError {
  readonly kind = 'ImmutableFieldConflict';
  readonly path: string;
  readonly desired: SpecValue | undefined;
  readonly actual: SpecValue | undefined;

  constructor(path: string, desired: SpecValue | undefined, actual: SpecValue | undefined, context: ReconcileErrorContext = {}) {
    super(`Field "${path}" cannot be changed from ${JSON.stringify(actual)} to ${JSON.stringify(desired)} on an existing resource`, context);
    this.path = path;
    this.desired = desired;
    this.actual = actual;
  }

  /** Same conflict, annotated with the resource it was found on. */
  withContext(context: ReconcileErrorContext): ImmutableFieldConflict {
    return new ImmutableFieldConflict(this.path, this.desired, this.actual, { ...context, cause: this.cause });
  }
}

export interface ProviderRequestDetails extends ReconcileErrorContext {
  statusCode?: number;
  code?: string;
  /** Server-requested delay before retrying, from a `Retry-After` header. */
  retryAfterMs?: number;
}

export class ProviderRequestError extends ReconcileError {
  readonly kind = 'ProviderRequestError';
  readonly statusCode?: number;
  readonly code?: string;
  readonly retryAfterMs?: number;

  constructor(message: string, details: ProviderRequestDetails = {}) {
    super(message, details);
    this.statusCode = details.statusCode;
    this.code = details.code;
    this.retryAfterMs = details.retryAfterMs;
  }

  /** Same failure, annotated with what the engine was doing. */
  withContext(context: ReconcileErrorContext): ProviderRequestError {
    return new ProviderRequestError(this.message, {
      statusCode: this.statusCode,
      code: this.code,
      retryAfterMs: this.retryAfterMs,
      identity: context.identity ?? this.identity,
      action: context.action ?? this.action,
      cause: this.cause,
    });
  }

  /** The single read failure that means "resource absent" rather than a broken request. */
  get isNotFound(): boolean {
    return this.statusCode === 404 || this.code === 'ResourceNotFound' || this.code === 'NotFound';
  }
}

export class OperationTimeout extends ReconcileError {
  readonly kind = 'OperationTimeout';
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context: ReconcileErrorContext = {}) {
    super(message, context);
    this.timeoutMs = timeoutMs;
  }
}

export class ProvisioningFailed extends ReconcileError {
  readonly kind = 'ProvisioningFailed';
  readonly status: string;

  constructor(message: string, status: string, context: ReconcileErrorContext = {}) {
    super(message, context);
    this.status = status;
  }
}

/** A request the engine refuses before touching anything, e.g. a duplicate identity or a malformed desired spec. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

export function describeError(error: unknown): string {
  if (error instanceof ReconcileError) {
    const where = error.identity ? ` [${error.identity.toString()}${error.action ? ` during ${error.action}` : ''}]` : '';
    return `${error.kind}: ${error.message}${where}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Node's `code` on system errors, e.g. `ENOENT`. */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}
