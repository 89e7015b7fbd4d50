/**
 * Error taxonomy for the master, node and single runtimes.
 *
 * Stale nodes are not errors; they are a rendered state of the digest.
 */

export type ErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'VALIDATION_FAILED'
  | 'DISPATCH_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'CONFIGURATION_INVALID';

export abstract class AppError extends Error {
  public abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or wrong shared token. The message never includes the presented token. */
export class AuthenticationError extends AppError {
  public readonly code = 'AUTHENTICATION_FAILED';

  constructor() {
    super('Unauthorized');
  }
}

export class ValidationError extends AppError {
  public readonly code = 'VALIDATION_FAILED';

  constructor(public readonly reason: string) {
    super(`Invalid report: ${reason}`);
  }
}

export class DispatchError extends AppError {
  public readonly code = 'DISPATCH_FAILED';

  constructor(
    message: string,
    public readonly recipientId: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends AppError {
  public readonly code = 'PERSISTENCE_FAILED';
}

export class ConfigurationError extends AppError {
  public readonly code = 'CONFIGURATION_INVALID';
}

export interface RequestBodyError {
  status: number;
  type: string;
}

/**
 * body-parser rejections (malformed JSON, oversize body, unsupported charset)
 * carry a 4xx status and a type tag; anything else is not a client error.
 */
export function asRequestBodyError(error: unknown): RequestBodyError | undefined {
  if (!(error instanceof Error) || !('status' in error) || !('type' in error)) return undefined;
  const { status, type } = error;
  if (typeof status !== 'number' || typeof type !== 'string' || status < 400 || status >= 500) {
    return undefined;
  }
  return { status, type };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
