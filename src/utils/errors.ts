export type ErrorKind =
  | 'NotFoundError'
  | 'ValidationError'
  | 'UnsupportedFieldTypeError'
  | 'TransportError'
  | 'RemoteLogicalError';

/**
 * Base class for every failure the field engine reports.
 * Only transport failures are worth retrying.
 */
export abstract class ProjectFieldsError extends Error {
  abstract readonly kind: ErrorKind;

  get retryable(): boolean {
    return false;
  }
}

/** A project, field, option, iteration or item did not resolve. */
export class NotFoundError extends ProjectFieldsError {
  readonly kind = 'NotFoundError' as const;
  name = 'NotFoundError';
}

/** Malformed input, caught before any remote call. */
export class ValidationError extends ProjectFieldsError {
  readonly kind = 'ValidationError' as const;
  name = 'ValidationError';
}

export class UnsupportedFieldTypeError extends ProjectFieldsError {
  readonly kind = 'UnsupportedFieldTypeError' as const;
  name = 'UnsupportedFieldTypeError';

  constructor(
    readonly fieldName: string,
    readonly dataType: string,
  ) {
    super(`Unsupported field type: ${dataType} (field "${fieldName}")`);
  }
}

/** gh could not be run, exited non-zero, timed out or printed garbage. */
export class TransportError extends ProjectFieldsError {
  readonly kind = 'TransportError' as const;
  name = 'TransportError';
  private readonly transient: boolean;

  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.transient = options.retryable ?? true;
  }

  override get retryable(): boolean {
    return this.transient;
  }
}

/** The call went through but GraphQL answered with errors[] or an unexpected payload. */
export class RemoteLogicalError extends ProjectFieldsError {
  readonly kind = 'RemoteLogicalError' as const;
  name = 'RemoteLogicalError';
}

/**
 * GitHub reports an unknown node ID, login or project number as an errors[]
 * entry. Such errors become NotFoundError, with `message` when given or the
 * remote text otherwise; every other error is returned unchanged.
 */
export function asNotFound(error: ProjectFieldsError, message?: string): ProjectFieldsError {
  if (error instanceof RemoteLogicalError && /Could not resolve to/i.test(error.message)) {
    return new NotFoundError(message ?? error.message);
  }
  return error;
}

export function toProjectFieldsError(err: unknown): ProjectFieldsError {
  if (err instanceof ProjectFieldsError) return err;
  // Anything else is a bug on this side of the call; repeating it cannot help
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(message, { retryable: false, cause: err });
}
