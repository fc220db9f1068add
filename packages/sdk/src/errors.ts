/**
 * Error types for studylog operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - File errors include the absolute target path in the message
 */

/**
 * Base class for all studylog errors
 */
export abstract class StudyLogError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when one object literal cannot yield a valid session
 */
export class MalformedRecordError extends StudyLogError {
  readonly code = "E_MALFORMED_RECORD";

  constructor(
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed session record: ${reason}`, options);
  }
}

/**
 * Thrown when a collection payload is not an array literal
 */
export class MalformedCollectionError extends StudyLogError {
  readonly code = "E_MALFORMED_COLLECTION";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Malformed session collection: ${reason}`, options);
  }
}

/**
 * Thrown when a session field violates its invariant
 */
export class InvalidSessionError extends StudyLogError {
  readonly code = "E_INVALID_SESSION";

  constructor(
    public readonly field: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a session id is unknown
 */
export class SessionNotFoundError extends StudyLogError {
  readonly code = "E_SESSION_NOT_FOUND";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Session not found: ${id}`, options);
  }
}

/**
 * Thrown when a session id is already taken
 */
export class DuplicateSessionError extends StudyLogError {
  readonly code = "E_DUPLICATE_SESSION";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Session already exists: ${id}`, options);
  }
}

/**
 * Thrown when the store file cannot be read
 */
export class DocumentReadError extends StudyLogError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when the store file cannot be written
 */
export class DocumentWriteError extends StudyLogError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends StudyLogError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when the store lock cannot be acquired in time
 */
export class LockTimeoutError extends StudyLogError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may indicate a stale lock from a crashed process - ` +
        `manually delete the lock file if safe.`,
      options
    );
  }
}
