/**
 * Failure reading or writing a path on disk.
 */
export class IOError extends Error {
  readonly path: string;
  readonly code: string | undefined;

  constructor(message: string, path: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "IOError";
    this.path = path;
    this.code = options.code;
  }
}

/** The path vanished between discovery and processing. */
export class NotFoundError extends IOError {
  constructor(message: string, path: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, path, options);
    this.name = "NotFoundError";
  }
}

export class PermissionError extends IOError {
  constructor(message: string, path: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, path, options);
    this.name = "PermissionError";
  }
}

/**
 * The persisted index could not be parsed or does not match the expected shape.
 */
export class CorruptStateError extends Error {
  readonly statePath: string;

  constructor(message: string, statePath: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CorruptStateError";
    this.statePath = statePath;
  }
}

export class ScanInProgressError extends Error {
  constructor() {
    super("A scan is already running on this engine.");
    this.name = "ScanInProgressError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Wraps a filesystem error in the matching IOError subclass.
 */
export function toIOError(err: unknown, path: string): IOError {
  if (err instanceof IOError) {
    return err;
  }

  const code = errnoCode(err);
  const message = `${path}: ${errorMessage(err)}`;
  switch (code) {
    case "ENOENT":
    case "ENOTDIR":
      return new NotFoundError(message, path, { code, cause: err });
    case "EACCES":
    case "EPERM":
      return new PermissionError(message, path, { code, cause: err });
    default:
      return new IOError(message, path, { code, cause: err });
  }
}
