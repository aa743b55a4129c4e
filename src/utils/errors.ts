type AppErrorOptions = { cause?: unknown };

/**
 * Base class for failures the CLI and the API know how to report.
 * `status` is the HTTP status the API answers with; `exitCode` is the CLI's.
 */
export class AppError extends Error {
  readonly status: number;
  readonly exitCode: number;

  constructor(message: string, status: number, exitCode: number, options: AppErrorOptions = {}) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.exitCode = exitCode;
  }
}

/** Network failure, timeout or non-2xx response while fetching a page. */
export class FetchError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 502, 1, options);
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 400, 2, options);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 403, 2, options);
  }
}

export class ParseError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 422, 2, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 500, 2, options);
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
