/** Every way a noter operation can fail */
export type NoterErrorKind =
  | 'AlreadyExists'
  | 'CourseNotFound'
  | 'AmbiguousCourse'
  | 'InvalidArgument'
  | 'IOError';

/**
 * Base class for errors raised by noter operations.
 * The `kind` field lets callers branch without instanceof chains.
 */
export class NoterError extends Error {
  constructor(
    public readonly kind: NoterErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'NoterError';
  }
}

export class AlreadyExistsError extends NoterError {
  constructor(public readonly targetPath: string, message?: string, options?: { cause?: unknown }) {
    super('AlreadyExists', message ?? `${targetPath} already exists`, options);
    this.name = 'AlreadyExistsError';
  }
}

export class CourseNotFoundError extends NoterError {
  constructor(public readonly code: string, public readonly root: string) {
    super('CourseNotFound', `Could not find notes folder for course ${code} in ${root}`);
    this.name = 'CourseNotFoundError';
  }
}

export class AmbiguousCourseError extends NoterError {
  constructor(public readonly code: string, public readonly candidates: string[]) {
    super('AmbiguousCourse', `Course ${code} matches more than one folder: ${candidates.join(', ')}`);
    this.name = 'AmbiguousCourseError';
  }
}

export class InvalidArgumentError extends NoterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InvalidArgument', message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class NoterIOError extends NoterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOError', message, options);
    this.name = 'NoterIOError';
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Wrap a raw filesystem failure into the noter taxonomy.
 * Errors that are already NoterErrors pass through untouched.
 *
 * @param error - The thrown value
 * @param targetPath - The path the failed operation was working on
 * @param action - Short description used in the message, e.g. "create folder"
 */
export function toNoterError(error: unknown, targetPath: string, action: string): NoterError {
  if (error instanceof NoterError) {
    return error;
  }
  if (isErrnoException(error) && error.code === 'EEXIST') {
    return new AlreadyExistsError(targetPath, undefined, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new NoterIOError(`Failed to ${action} ${targetPath}: ${reason}`, { cause: error });
}
