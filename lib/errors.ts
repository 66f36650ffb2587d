export class UploadError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = "UploadError";
    this.status = status;
  }
}

export class ColumnNotFoundError extends UploadError {
  constructor(message: string) {
    super(message, 422);
    this.name = "ColumnNotFoundError";
  }
}

export class InsufficientColumnsError extends UploadError {
  required: number;
  actual: number;

  constructor(required: number, actual: number) {
    super(`Upload has ${actual} column(s), layout needs at least ${required}.`, 422);
    this.name = "InsufficientColumnsError";
    this.required = required;
    this.actual = actual;
  }
}

export class InvalidLayoutError extends UploadError {
  constructor(message: string) {
    super(message, 400);
    this.name = "InvalidLayoutError";
  }
}

export class DecodeError extends UploadError {
  constructor(message: string) {
    super(message, 415);
    this.name = "DecodeError";
  }
}

export class StudentNotFoundError extends UploadError {
  constructor(name: string) {
    super(`Student not found: ${name}`, 404);
    this.name = "StudentNotFoundError";
  }
}

export class PersistenceError extends Error {
  status = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export function errorMessage(error: unknown, fallback: string) {
  return error instanceof Error ? error.message : fallback;
}
