// src/errors.ts

export class AppError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(detail, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(detail = "Invalid request body") {
    super(422, detail);
  }
}

// The driver error stays on `cause` for the server log, never in `detail`.
export class StorageError extends AppError {
  constructor(cause: unknown) {
    super(500, "Internal database error", { cause });
  }
}

export class NotFoundError extends AppError {
  constructor() {
    super(404, "Not found");
  }
}

export class MethodNotAllowedError extends AppError {
  constructor() {
    super(405, "Method not allowed");
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
