export class TransportError extends Error {
  public readonly method: string;
  public readonly status: number | null;
  public readonly errorCode: number | null;

  constructor(
    method: string,
    message: string,
    options: { status?: number | null; errorCode?: number | null; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.method = method;
    this.status = options.status ?? null;
    this.errorCode = options.errorCode ?? null;
  }
}

export type PersistenceOperation = 'init' | 'add' | 'listForChat' | 'deleteForChat' | 'statistics' | 'close';

export class PersistenceError extends Error {
  public readonly operation: PersistenceOperation;

  constructor(operation: PersistenceOperation, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ValidationError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function describeError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'unknown error';
}
