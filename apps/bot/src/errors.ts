export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super("not_found", message);
  }
}

// The ad exists but belongs to somebody else.
export class AuthorizationMismatchError extends AppError {
  constructor(message: string) {
    super("not_owner", message);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause && typeof cause === "object" && "message" in cause && typeof cause.message === "string") {
    return cause.message;
  }
  return String(cause);
}

function causeCode(cause: unknown): string | null {
  if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return null;
}

/**
 * Any failure talking to the store. `dbCode` carries the Postgres SQLSTATE when there is one.
 */
export class StoreError extends AppError {
  readonly operation: string;
  readonly dbCode: string | null;

  constructor(operation: string, cause: unknown) {
    super("store", `${operation} failed: ${describeCause(cause)}`, { cause });
    this.operation = operation;
    this.dbCode = causeCode(cause);
  }
}
