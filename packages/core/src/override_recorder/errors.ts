/**
 * Error classes for the override recorder
 */

/**
 * Base error class for override recording
 */
export class OverrideError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OverrideError';
    Object.setPrototypeOf(this, OverrideError.prototype);
  }
}

/**
 * Raised by a tier whose preconditions do not hold. The recorder reports
 * the tier as skipped and moves on; it is not counted as a failure.
 */
export class PreconditionFailedError extends OverrideError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Precondition failed: ${reason}`);
    this.name = 'PreconditionFailedError';
    this.reason = reason;
    Object.setPrototypeOf(this, PreconditionFailedError.prototype);
  }
}

export type FilesystemOperation = 'read' | 'write' | 'append' | 'create-temp' | 'remove-temp';

/**
 * Error thrown when a file cannot be written, appended or removed
 */
export class FilesystemError extends OverrideError {
  public readonly filePath: string;
  public readonly operation: FilesystemOperation;

  constructor(operation: FilesystemOperation, filePath: string, cause: string) {
    super(`Failed to ${operation} ${filePath}: ${cause}`);
    this.name = 'FilesystemError';
    this.filePath = filePath;
    this.operation = operation;
    Object.setPrototypeOf(this, FilesystemError.prototype);
  }
}
