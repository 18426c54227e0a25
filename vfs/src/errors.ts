/**
 * Error taxonomy of the virtual filesystem.
 *
 * Every class carries the HTTP status the API layer answers with.
 */
export class VfsError extends Error {
  readonly statusCode: number = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Non-2xx answer of the remote API
 */
export class ApiError extends VfsError {
  override readonly statusCode = 502;

  constructor(
    message: string,
    readonly status: number,
    readonly code?: number,
  ) {
    super(message);
  }
}

export class NotFoundError extends VfsError {
  override readonly statusCode = 404;

  constructor(readonly remote: string) {
    super(`object not found: ${remote}`);
  }
}

export class DirNotFoundError extends VfsError {
  override readonly statusCode = 404;

  constructor(readonly remote: string) {
    super(`directory not found: ${remote}`);
  }
}

export class DirExistsError extends VfsError {
  override readonly statusCode = 409;

  constructor(readonly remote: string) {
    super(`directory already exists: ${remote}`);
  }
}

export class FileExistsError extends VfsError {
  override readonly statusCode = 409;

  constructor(readonly remote: string) {
    super(`file already exists: ${remote}`);
  }
}

export class DirectoryNotEmptyError extends VfsError {
  override readonly statusCode = 400;

  constructor(readonly remote: string) {
    super(`directory not empty: ${remote}`);
  }
}

// The root only holds rule-derived top-level folders
export class RootReservedError extends VfsError {
  override readonly statusCode = 400;

  constructor() {
    super("can't create directories in root directory, it is reserved for regex folders");
  }
}

export class InvalidPathError extends VfsError {
  override readonly statusCode = 400;

  constructor(message: string, readonly remote: string) {
    super(`${message}: ${remote}`);
  }
}

export class CantShareDirectoriesError extends VfsError {
  override readonly statusCode = 400;

  constructor(readonly remote: string) {
    super(`can't share directories: ${remote}`);
  }
}

export class BrokenLinkError extends VfsError {
  override readonly statusCode = 502;

  constructor(message: string, readonly torrentId: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RuleFileError extends VfsError {
  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for remote answers that mean the direct link is gone
 */
export function isBrokenLinkStatus(error: unknown): error is ApiError {
  return error instanceof ApiError && (error.status === 503 || error.status === 404);
}
