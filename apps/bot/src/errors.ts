/** Input that does not fit the current step. The user is asked again. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** The user is not on the whitelist. */
export class AuthorizationError extends Error {
  constructor(readonly userId: string) {
    super(`User ${userId} is not allowed`);
    this.name = "AuthorizationError";
  }
}

/** The report store could not complete a read or write. */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Bad environment or configuration file; raised at startup only. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
