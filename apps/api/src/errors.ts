// Errors that reach the HTTP layer carry a machine-readable code and a status.
export class AppError extends Error {
  readonly error: string;
  readonly statusCode: number;

  constructor(error: string, message: string, statusCode = 400) {
    super(message);
    this.name = "AppError";
    this.error = error;
    this.statusCode = statusCode;
  }
}

export function notFound(what: string): AppError {
  return new AppError(`${what}_not_found`, `${what} not found`, 404);
}

// Persistence failure; aborts the current job tick.
export class StoreError extends Error {
  readonly step: string;
  readonly details: string | null;

  constructor(step: string, cause: { message: string; details?: string | null } | Error) {
    super(`${step}: ${cause.message}`);
    this.name = "StoreError";
    this.step = step;
    this.details = "details" in cause && typeof cause.details === "string" ? cause.details : null;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
