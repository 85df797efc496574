/**
 * Error taxonomy
 *
 * Every failure inside an operation is raised as one of these and converted
 * into a result record (`status`, `message`, `errorKind`) at the boundary of
 * that operation.
 */

export type ErrorKind = 'io' | 'parse' | 'not-found' | 'collision' | 'validation';

export class DatmatchError extends Error {
  public readonly kind: ErrorKind;
  public readonly path?: string;

  constructor(kind: ErrorKind, message: string, path?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DatmatchError';
    this.kind = kind;
    this.path = path;
  }
}

/** File unreadable, or a rename/copy rejected by the OS */
export class IOError extends DatmatchError {
  constructor(message: string, path?: string, cause?: unknown) {
    super('io', message, path, cause);
    this.name = 'IOError';
  }
}

/** Malformed catalog source */
export class ParseError extends DatmatchError {
  constructor(message: string, path?: string, cause?: unknown) {
    super('parse', message, path, cause);
    this.name = 'ParseError';
  }
}

/** No catalog covers the file. A normal outcome, not a failure */
export class NotFoundError extends DatmatchError {
  constructor(message: string, path?: string) {
    super('not-found', message, path);
    this.name = 'NotFoundError';
  }
}

/** Rename destination already exists */
export class CollisionError extends DatmatchError {
  constructor(message: string, path?: string) {
    super('collision', message, path);
    this.name = 'CollisionError';
  }
}

/** Path is not a file, extension not recognized, or a bad setting */
export class ValidationError extends DatmatchError {
  constructor(message: string, path?: string) {
    super('validation', message, path);
    this.name = 'ValidationError';
  }
}

export function isDatmatchError(error: unknown): error is DatmatchError {
  return error instanceof DatmatchError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === undefined || error === null) {
    return 'Unknown error';
  }
  return JSON.stringify(error);
}
