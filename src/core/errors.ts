/**
 * Error taxonomy for the video job lifecycle
 */

export class UnsupportedAttachmentTypeError extends Error {
  readonly supported: readonly string[];

  constructor(supported: readonly string[]) {
    super(`unsupported reference file type; supported types: ${supported.join(', ')}`);
    this.name = 'UnsupportedAttachmentTypeError';
    this.supported = supported;
  }
}

export class InvalidSubmissionError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid submission: ${issues.join('; ')}`);
    this.name = 'InvalidSubmissionError';
    this.issues = issues;
  }
}

/**
 * Any non-2xx response from the remote service
 */
export class RemoteApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'RemoteApiError';
    this.status = status;
  }
}

/**
 * 2xx response that is missing a required field or cannot be decoded
 */
export class MalformedResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/**
 * The remote job reached a terminal failure state
 */
export class JobFailedError extends Error {
  readonly status: string;

  constructor(status: string, message: string) {
    super(message);
    this.name = 'JobFailedError';
    this.status = status;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends Error {
  constructor(message = 'operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Local file I/O failure, carrying the operation and path
 */
export class FileOperationError extends Error {
  readonly operation: string;
  readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    super(`${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'FileOperationError';
    this.operation = operation;
    this.path = path;
  }
}

/**
 * Render an error for the user
 */
export function describeError(error: unknown): string {
  if (error instanceof RemoteApiError) {
    return `API error (${error.status}): ${error.message}`;
  }
  if (error instanceof JobFailedError) {
    const generic = `job ${error.status}`;
    return error.message === generic ? generic : `${generic}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
