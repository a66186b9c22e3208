export class ConnectivityError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConnectivityError";
  }
}

export class AuthenticationError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class TargetNotFoundError extends Error {
  constructor(message: string, public folderId: string, public cause?: unknown) {
    super(message);
    this.name = "TargetNotFoundError";
  }
}

export class ValidationFailedError extends Error {
  constructor(message: string, public details?: string) {
    super(message);
    this.name = "ValidationFailedError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RemoteStoreError extends Error {
  constructor(message: string, public statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteStoreError";
  }
}

/** Fatal categories: the run stops and exits with a failure status. */
export type FatalError =
  | ConnectivityError
  | AuthenticationError
  | TargetNotFoundError
  | ValidationFailedError
  | ConfigError;

export function isFatalError(err: unknown): err is FatalError {
  return (
    err instanceof ConnectivityError ||
    err instanceof AuthenticationError ||
    err instanceof TargetNotFoundError ||
    err instanceof ValidationFailedError ||
    err instanceof ConfigError
  );
}

// The store reports folder name conflicts only through the message text.
export function isAlreadyExistsError(err: unknown): boolean {
  return err instanceof Error && err.message.toLowerCase().includes("already exists");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
