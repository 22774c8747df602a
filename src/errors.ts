export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credentials could not be loaded, refreshed or granted. Aborts the run. */
export class AuthError extends SyncError {}

/** The root folder or its class folders could not be found. Aborts the run. */
export class LookupError extends SyncError {}

export class TransferError extends SyncError {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.key = key;
  }
}

export class CleanupError extends SyncError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

export function describeError(err: unknown) {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
